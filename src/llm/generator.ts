import type {
    GenerationOutput,
    GenerationRequest,
    LLMMessage,
    LLMProvider,
    NarrativeGeneratorLike,
} from '../types/llm.js';
import { DEFAULTS } from '../types/options.js';
import { parseGenerationOutput } from './outputParser.js';

export const SYSTEM_PROMPT =
    `You are formatting a literal, first-person narrative from a ${DEFAULTS.platformTitle} perspective. ` +
    'Only use the SDK tokens provided in AllowedTokens. ' +
    'Do not claim anything not supported by Passages. ' +
    "Cite claims like [id]. Keep it concise (90-130 words). Use first-person 'I'. " +
    'Return ONLY JSON with keys: narrative, citationsUsed, tokensUsed. ' +
    'Do NOT cite any passage id except those in the provided Passages.';

const NARRATIVE_TASK =
    'Describe the event strictly in SDK terms (AllowedTokens). ' +
    'Omit notions not present in Passages. Cite each factual claim like [pad.state.p12]. ' +
    'Do NOT invent or cite passage ids that are not in the provided Passages.';

export function buildMessages(request: GenerationRequest): LLMMessage[] {
    const user = {
        EventBrief: request.eventBrief,
        AllowedTokens: request.allowedTokens,
        Passages: request.passages,
        NarrativeTask: NARRATIVE_TASK,
    };
    return [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: JSON.stringify(user) },
    ];
}

export interface NarrativeGeneratorOptions {
    /** Receives the unparsed reply (the CLI prints it under --debug) */
    onRaw?: (content: string) => void;
}

/**
 * Generation-service boundary: prompt the provider with the allowed vocabulary
 * and evidence, then parse whatever comes back. Transport failures propagate.
 */
export class NarrativeGenerator implements NarrativeGeneratorLike {
    private provider: LLMProvider;
    private options: NarrativeGeneratorOptions;

    constructor(provider: LLMProvider, options: NarrativeGeneratorOptions = {}) {
        this.provider = provider;
        this.options = options;
    }

    async generate(request: GenerationRequest): Promise<GenerationOutput> {
        const response = await this.provider.complete(buildMessages(request));
        this.options.onRaw?.(response.content);
        return parseGenerationOutput(response.content);
    }
}
