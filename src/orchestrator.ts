/**
 * Narrative pipeline
 *
 * INTERPRET -> (FALLBACK | EXPAND -> SELECT -> GENERATE -> LINT) -> DONE
 *
 * One request runs start to finish; the generator call is the only await.
 * An invalid lint verdict is reported on the result, never retried.
 */

import type { NarrativeContext } from './vocabulary/loader.js';
import type {
    InterpretationResult,
    NarrativeGeneratorLike,
    NarrativeOptions,
    NarrativeResult,
} from './types/index.js';
import { DEFAULTS, FALLBACK_NARRATIVE } from './types/options.js';
import { interpretEvent } from './interpreter.js';
import { expandWithRequires } from './resolver.js';
import { selectPassages } from './evidence.js';
import { lintOutput, repairOutput } from './validator.js';

/**
 * True when the input offers nothing to narrate: no activated symbol, or no
 * distinct token with a lexicon entry.
 */
export function shouldFallback(interpretation: InterpretationResult): boolean {
    const distinctTokens = new Set(interpretation.tokens).size;
    return interpretation.bagOfApi.length === 0 || interpretation.unrepresentable.length === distinctTokens;
}

export function fallbackResult(): NarrativeResult {
    return {
        narrative: FALLBACK_NARRATIVE,
        citationsUsed: [],
        tokensUsed: [],
        ok: true,
        activatedTokens: [],
        allowedTokens: [],
        providedIds: [],
        fallback: true,
    };
}

export async function generateNarrative(
    ctx: NarrativeContext,
    generator: NarrativeGeneratorLike,
    eventText: string,
    options: NarrativeOptions = {}
): Promise<NarrativeResult> {
    const { onProgress } = options;
    const maxQuotes = options.maxQuotes ?? DEFAULTS.maxQuotes;

    onProgress?.('interpret', 'Interpreting event');
    const interpretation = interpretEvent(ctx, eventText);
    const activated = interpretation.bagOfApi;
    const banned = interpretation.unrepresentable;
    onProgress?.('interpret', `Activated tokens: ${JSON.stringify(activated)}`);
    onProgress?.('interpret', `Unrepresentable: ${JSON.stringify(banned)}`);

    if (shouldFallback(interpretation)) {
        onProgress?.('fallback', 'No SDK tokens activated. Returning fallback narrative.');
        return fallbackResult();
    }

    onProgress?.('expand', 'Expanding prerequisites');
    const allowedTokens = expandWithRequires(ctx.vocabulary, activated);
    onProgress?.('expand', `AllowedTokens: ${JSON.stringify(allowedTokens)}`);

    onProgress?.('select', 'Selecting passages (event-minimal)');
    const quotes = selectPassages(ctx, activated, maxQuotes);
    const providedIds = quotes.map(q => q.id);
    onProgress?.('select', `Passages: ${JSON.stringify(providedIds)}`);

    onProgress?.('generate', 'Asking the generation service');
    const generated = await generator.generate({ allowedTokens, passages: quotes, eventBrief: eventText });

    onProgress?.('lint', 'Linting output');
    const repaired = repairOutput(generated, providedIds);
    const { ok, issues } = lintOutput(repaired, allowedTokens, providedIds, banned);

    return {
        ...repaired,
        ok,
        ...(ok ? {} : { issues }),
        activatedTokens: activated,
        allowedTokens,
        providedIds,
    };
}
