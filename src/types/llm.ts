/**
 * LLM Provider and Generation interfaces.
 */
import type { Quote } from './vocabulary.js';

export interface LLMMessage {
    role: 'system' | 'user' | 'assistant';
    content: string;
}

export interface LLMResponse {
    content: string;
    usage?: {
        promptTokens: number;
        completionTokens: number;
    };
}

export interface LLMProvider {
    complete(messages: LLMMessage[]): Promise<LLMResponse>;
}

export interface GenerationRequest {
    /** Allowed-token set in dependency order */
    allowedTokens: string[];
    passages: Quote[];
    eventBrief: string;
}

/**
 * What the generator claims to have written.
 * `parseError` and `raw` are set only when the reply held no usable JSON object.
 */
export interface GenerationOutput {
    narrative: string;
    citationsUsed: string[];
    tokensUsed: string[];
    parseError?: string;
    raw?: string;
}

export interface NarrativeGeneratorLike {
    generate(request: GenerationRequest): Promise<GenerationOutput>;
}
