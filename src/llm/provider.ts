import { z } from 'zod';
import type { LLMProvider, LLMMessage, LLMResponse } from '../types/llm.js';
import type { LLMConfig } from '../config.js';
import { NarrativeException, createGenerationError, createTimeoutError } from '../types/errors.js';

const chatResponseSchema = z.object({
    choices: z.array(z.object({ message: z.object({ content: z.string().nullish() }) })).optional(),
    message: z.object({ content: z.string().nullish() }).optional(),
    usage: z
        .object({
            prompt_tokens: z.number().optional(),
            completion_tokens: z.number().optional(),
        })
        .optional(),
});

/**
 * Chat-completion provider over fetch, for OpenAI-compatible servers
 * (OpenAI, LM Studio, llama.cpp, vLLM) and Ollama's native chat endpoint.
 * A single attempt per call, bounded by the configured timeout.
 */
export class StandardLLMProvider implements LLMProvider {
    private readonly config: LLMConfig;

    constructor(config: LLMConfig) {
        this.config = config;
    }

    async complete(messages: LLMMessage[]): Promise<LLMResponse> {
        const { type, apiUrl, apiKey, model, timeoutMs, temperature, maxTokens } = this.config;
        const payload = {
            model,
            messages,
            stream: false,
            // Ollama specific
            options: type === 'ollama' ? { temperature, num_predict: maxTokens } : undefined,
            // OpenAI specific
            temperature,
            max_tokens: maxTokens,
        };

        try {
            const headers: Record<string, string> = {
                'Content-Type': 'application/json',
            };
            if (apiKey) {
                headers['Authorization'] = `Bearer ${apiKey}`;
            }

            const response = await fetch(apiUrl, {
                method: 'POST',
                headers,
                body: JSON.stringify(payload),
                signal: AbortSignal.timeout(timeoutMs),
            });

            if (!response.ok) {
                const text = await response.text();
                throw createGenerationError(`HTTP ${response.status}: ${text}`, { status: response.status });
            }

            const parsed = chatResponseSchema.safeParse(await response.json());
            if (!parsed.success) {
                throw createGenerationError('unexpected response shape', { issues: parsed.error.issues.length });
            }

            const data = parsed.data;
            const content = data.choices?.[0]?.message.content ?? data.message?.content ?? '';

            return {
                content,
                usage: {
                    promptTokens: data.usage?.prompt_tokens ?? 0,
                    completionTokens: data.usage?.completion_tokens ?? 0,
                },
            };
        } catch (error) {
            if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
                throw createTimeoutError(timeoutMs, 'Generation request');
            }
            if (error instanceof NarrativeException) {
                console.error(`LLM Provider Error: ${error.message}`, { model, url: apiUrl });
                throw error;
            }
            const errMsg = error instanceof Error ? error.message : String(error);
            console.error(`LLM Provider Error: ${errMsg}`, { model, url: apiUrl });
            throw createGenerationError(errMsg, { model, url: apiUrl });
        }
    }
}
