import { z } from 'zod';
import type { NarrativeContext } from '../vocabulary/loader.js';
import type {
    InterpretationResult,
    LintResult,
    NarrativeGeneratorLike,
    NarrativeResult,
    PipelineStep,
    Quote,
} from '../types/index.js';
import { DEFAULTS } from '../types/options.js';
import { interpretEvent } from '../interpreter.js';
import { expandWithRequires, prerequisitesOnly } from '../resolver.js';
import { selectPassages } from '../evidence.js';
import { lintOutput, repairOutput } from '../validator.js';
import { generateNarrative } from '../orchestrator.js';
import { checkDataConsistency, ConsistencyReport } from '../vocabulary/consistency.js';
import { parseArgs } from './utils.js';

const tokenList = z.array(z.string());
const maxQuotes = z.number().int().min(0).optional();

const interpretArgs = z.object({ text: z.string() });
const expandArgs = z.object({ tokens: tokenList });
const selectArgs = z.object({ tokens: tokenList, max_quotes: maxQuotes });
const lintArgs = z.object({
    narrative: z.string(),
    citations_used: tokenList,
    tokens_used: tokenList.default([]),
    allowed_tokens: tokenList,
    provided_ids: tokenList,
    banned_terms: tokenList.default([]),
    repair: z.boolean().default(true),
});
const generateArgs = z.object({ text: z.string().min(1), max_quotes: maxQuotes });

export function interpretEventHandler(args: unknown, ctx: NarrativeContext): InterpretationResult {
    const { text } = parseArgs(interpretArgs, args, 'interpret-event');
    return interpretEvent(ctx, text);
}

export function expandRequiresHandler(
    args: unknown,
    ctx: NarrativeContext
): { allowedTokens: string[]; prerequisites: string[] } {
    const { tokens } = parseArgs(expandArgs, args, 'expand-requires');
    const prereqs = prerequisitesOnly(ctx.vocabulary, tokens);
    return {
        allowedTokens: expandWithRequires(ctx.vocabulary, tokens),
        prerequisites: [...prereqs],
    };
}

export function selectPassagesHandler(
    args: unknown,
    ctx: NarrativeContext
): { passages: Quote[]; providedIds: string[] } {
    const { tokens, max_quotes } = parseArgs(selectArgs, args, 'select-passages');
    const passages = selectPassages(ctx, tokens, max_quotes ?? DEFAULTS.maxQuotes);
    return { passages, providedIds: passages.map(p => p.id) };
}

export function lintNarrativeHandler(args: unknown): LintResult & { narrative: string; citationsUsed: string[] } {
    const a = parseArgs(lintArgs, args, 'lint-narrative');
    const output = { narrative: a.narrative, citationsUsed: a.citations_used, tokensUsed: a.tokens_used };
    const checked = a.repair ? repairOutput(output, a.provided_ids) : output;
    const verdict = lintOutput(checked, a.allowed_tokens, a.provided_ids, a.banned_terms);
    return { ...verdict, narrative: checked.narrative, citationsUsed: checked.citationsUsed };
}

export async function generateNarrativeHandler(
    args: unknown,
    ctx: NarrativeContext,
    generator: NarrativeGeneratorLike,
    defaultMaxQuotes: number,
    onProgress?: (step: PipelineStep, message: string) => void
): Promise<NarrativeResult> {
    const { text, max_quotes } = parseArgs(generateArgs, args, 'generate-narrative');
    return generateNarrative(ctx, generator, text, {
        maxQuotes: max_quotes ?? defaultMaxQuotes,
        onProgress,
    });
}

export function checkDataHandler(ctx: NarrativeContext): ConsistencyReport {
    return checkDataConsistency(ctx.tables);
}
