import { generateText, type CoreMessage } from 'ai';
import { createOpenAI } from '@ai-sdk/openai';
import type { LLMProvider, LLMMessage, LLMResponse } from '../types/llm.js';
import type { LLMConfig } from '../config.js';
import { createGenerationError, createTimeoutError } from '../types/errors.js';

function toCoreMessage(message: LLMMessage): CoreMessage {
    switch (message.role) {
        case 'system':
            return { role: 'system', content: message.content };
        case 'assistant':
            return { role: 'assistant', content: message.content };
        case 'user':
            return { role: 'user', content: message.content };
    }
}

/**
 * Provider backed by the AI SDK's OpenAI-compatible chat model.
 * Retries are disabled: a failed call fails the request.
 */
export class AiSdkProvider implements LLMProvider {
    private readonly config: LLMConfig;
    private readonly openai: ReturnType<typeof createOpenAI>;

    constructor(config: LLMConfig) {
        this.config = config;
        this.openai = createOpenAI({
            baseURL: config.baseUrl,
            // Local servers ignore the key but the SDK insists on one.
            apiKey: config.apiKey || 'not-needed',
        });
    }

    async complete(messages: LLMMessage[]): Promise<LLMResponse> {
        const { model, timeoutMs, temperature, maxTokens, baseUrl } = this.config;
        try {
            const result = await generateText({
                model: this.openai.chat(model),
                messages: messages.map(toCoreMessage),
                temperature,
                maxTokens,
                maxRetries: 0,
                abortSignal: AbortSignal.timeout(timeoutMs),
            });

            return {
                content: result.text,
                usage: {
                    promptTokens: result.usage.promptTokens,
                    completionTokens: result.usage.completionTokens,
                },
            };
        } catch (error) {
            if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
                throw createTimeoutError(timeoutMs, 'Generation request');
            }
            const errMsg = error instanceof Error ? error.message : String(error);
            console.error(`LLM Provider Error: ${errMsg}`, { model, url: baseUrl });
            throw createGenerationError(errMsg, { model, url: baseUrl });
        }
    }
}
