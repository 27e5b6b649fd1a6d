export const DEFAULTS = {
    maxQuotes: 4,
    llmTimeoutMs: 90000,
    llmTemperature: 0.2,
    llmMaxTokens: 400,
    localChatUrl: 'http://localhost:1234/v1/chat/completions',
    localModel: 'google/gemma-3n-e4b',
    openaiModel: 'gpt-4o',
    ollamaModel: 'llama3',
    /** Platform name that may appear capitalized in any narrative */
    platformName: 'PS1',
    platformTitle: 'PlayStation (PS1) SDK',
} as const;

/** Capitalized words accepted by the linter regardless of the allowed-token set */
export const LINT_EXEMPTIONS: ReadonlySet<string> = new Set(['I', DEFAULTS.platformName]);

export const FALLBACK_NARRATIVE =
    'No part of the PlayStation SDK vocabulary can be used to describe this event. ' +
    'The input does not map to any known SDK concepts or tokens.';

export const VERSION = '0.1.0';
