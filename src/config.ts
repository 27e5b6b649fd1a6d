/**
 * Process configuration, read from the environment (and .env via dotenv in the entry points).
 */
import { z } from 'zod';
import { DEFAULTS } from './types/options.js';
import { DEFAULT_DATA_DIR } from './vocabulary/loader.js';
import { createGenericError } from './types/errors.js';

export type ProviderKind = 'fetch' | 'ai-sdk';

export interface LLMConfig {
    type: 'openai' | 'ollama';
    /** Full chat endpoint used by the fetch provider */
    apiUrl: string;
    /** OpenAI-compatible base URL used by the AI SDK provider */
    baseUrl: string;
    apiKey: string;
    model: string;
    timeoutMs: number;
    temperature: number;
    maxTokens: number;
}

export interface NarratorConfig {
    dataDir: string;
    maxQuotes: number;
    provider: ProviderKind;
    llm: LLMConfig;
}

// Empty variables count as unset.
function optional<T extends z.ZodTypeAny>(schema: T) {
    return z.preprocess(v => (v === '' ? undefined : v), schema.optional());
}

const envSchema = z.object({
    NARRATIVE_DATA_DIR: optional(z.string()),
    NARRATIVE_MAX_QUOTES: optional(z.coerce.number().int().min(0)),
    NARRATIVE_PROVIDER: optional(z.enum(['fetch', 'ai-sdk'])),
    OPENAI_BASE_URL: optional(z.string().url()),
    OPENAI_API_KEY: optional(z.string()),
    OPENAI_MODEL: optional(z.string()),
    OLLAMA_URL: optional(z.string().url()),
    OLLAMA_MODEL: optional(z.string()),
    LLM_TIMEOUT_MS: optional(z.coerce.number().int().positive()),
    LLM_TEMPERATURE: optional(z.coerce.number().min(0).max(2)),
    LLM_MAX_TOKENS: optional(z.coerce.number().int().positive()),
});

type Env = z.infer<typeof envSchema>;

function resolveEndpoint(env: Env): Pick<LLMConfig, 'type' | 'apiUrl' | 'baseUrl' | 'model'> {
    if (env.OPENAI_BASE_URL) {
        // Custom OpenAI-compatible endpoint (LM Studio, llama.cpp, vLLM)
        const trimmed = env.OPENAI_BASE_URL.replace(/\/$/, '');
        const apiUrl = trimmed.endsWith('/chat/completions') ? trimmed : `${trimmed}/chat/completions`;
        return {
            type: 'openai',
            apiUrl,
            baseUrl: apiUrl.replace(/\/chat\/completions$/, ''),
            model: env.OPENAI_MODEL ?? DEFAULTS.localModel,
        };
    }
    if (env.OPENAI_API_KEY) {
        return {
            type: 'openai',
            apiUrl: 'https://api.openai.com/v1/chat/completions',
            baseUrl: 'https://api.openai.com/v1',
            model: env.OPENAI_MODEL ?? DEFAULTS.openaiModel,
        };
    }
    if (env.OLLAMA_URL) {
        return {
            type: 'ollama',
            apiUrl: env.OLLAMA_URL,
            baseUrl: `${new URL(env.OLLAMA_URL).origin}/v1`,
            model: env.OLLAMA_MODEL ?? DEFAULTS.ollamaModel,
        };
    }
    return {
        type: 'openai',
        apiUrl: DEFAULTS.localChatUrl,
        baseUrl: DEFAULTS.localChatUrl.replace(/\/chat\/completions$/, ''),
        model: env.OPENAI_MODEL ?? DEFAULTS.localModel,
    };
}

/**
 * @throws NarrativeException INVALID_ARGUMENT when a variable is malformed
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): NarratorConfig {
    const parsed = envSchema.safeParse(source);
    if (!parsed.success) {
        const reason = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw createGenericError('INVALID_ARGUMENT', `Invalid configuration: ${reason}`);
    }
    const env = parsed.data;

    return {
        dataDir: env.NARRATIVE_DATA_DIR ?? DEFAULT_DATA_DIR,
        maxQuotes: env.NARRATIVE_MAX_QUOTES ?? DEFAULTS.maxQuotes,
        provider: env.NARRATIVE_PROVIDER ?? 'fetch',
        llm: {
            ...resolveEndpoint(env),
            apiKey: env.OPENAI_API_KEY ?? '',
            timeoutMs: env.LLM_TIMEOUT_MS ?? DEFAULTS.llmTimeoutMs,
            temperature: env.LLM_TEMPERATURE ?? DEFAULTS.llmTemperature,
            maxTokens: env.LLM_MAX_TOKENS ?? DEFAULTS.llmMaxTokens,
        },
    };
}
