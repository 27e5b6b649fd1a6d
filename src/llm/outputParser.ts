/**
 * Utilities for parsing generator replies into a GenerationOutput.
 */
import { z } from 'zod';
import type { GenerationOutput } from '../types/llm.js';

const outputSchema = z.object({
    narrative: z.string().catch(''),
    citationsUsed: z.array(z.string()).catch([]),
    tokensUsed: z.array(z.string()).catch([]),
});

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function emptyOutput(parseError: string, raw: string): GenerationOutput {
    return { narrative: '', citationsUsed: [], tokensUsed: [], parseError, raw };
}

/**
 * The brace-balanced substring starting at `start` (which must be '{'),
 * skipping braces inside string literals. Null when it never closes.
 */
function balancedObjectAt(text: string, start: number): string | null {
    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let i = start; i < text.length; i++) {
        const ch = text[i];
        if (inString) {
            if (escaped) escaped = false;
            else if (ch === '\\') escaped = true;
            else if (ch === '"') inString = false;
            continue;
        }
        if (ch === '"') inString = true;
        else if (ch === '{') depth++;
        else if (ch === '}') {
            depth--;
            if (depth === 0) return text.slice(start, i + 1);
        }
    }
    return null;
}

const OUTPUT_FIELDS = ['narrative', 'citationsUsed', 'tokensUsed'];

function hasOutputField(value: Record<string, unknown>): boolean {
    return OUTPUT_FIELDS.some(field => field in value);
}

/**
 * First well-formed JSON object embedded in `text` that carries at least one
 * output field, scanning left to right. Braces nested inside a rejected
 * candidate are not tried on their own.
 */
export function extractFirstJsonObject(text: string): { value: Record<string, unknown> } | { error: string } {
    let lastError = 'no-json-object-found';
    let start = text.indexOf('{');

    while (start !== -1) {
        const candidate = balancedObjectAt(text, start);
        let next = start + 1;
        if (candidate !== null) {
            try {
                const value: unknown = JSON.parse(candidate);
                if (isPlainObject(value) && hasOutputField(value)) return { value };
                lastError = 'no-output-fields';
            } catch (e) {
                lastError = e instanceof Error ? e.message : String(e);
            }
            next = start + candidate.length;
        }
        start = text.indexOf('{', next);
    }
    return { error: lastError };
}

/**
 * Parse a generator reply. Tries the whole reply first, then the first embedded
 * object (models like to wrap JSON in prose or code fences). Never throws:
 * an unusable reply becomes an empty output carrying `parseError` and `raw`.
 */
export function parseGenerationOutput(raw: string): GenerationOutput {
    let direct: unknown;
    try {
        direct = JSON.parse(raw);
    } catch {
        const extracted = extractFirstJsonObject(raw);
        return 'error' in extracted ? emptyOutput(extracted.error, raw) : outputSchema.parse(extracted.value);
    }
    if (!isPlainObject(direct)) return emptyOutput('not-a-json-object', raw);
    return hasOutputField(direct) ? outputSchema.parse(direct) : emptyOutput('no-output-fields', raw);
}
