/**
 * Post-generation repair and lint.
 *
 * Repair removes citations the generator was never given. Lint then checks the
 * repaired output without touching it again. The capitalized-token check is a
 * regex heuristic, not a parser: sentence-initial words are flagged, and
 * lowercase API names slip through.
 */

import type { GenerationOutput, LintResult } from './types/index.js';
import { LINT_EXEMPTIONS } from './types/options.js';

const CITATION_MARKER = /\[([a-zA-Z0-9_.-]+)\]/g;
const CAPITALIZED_TOKEN = /\b[A-Z][A-Za-z0-9_]*\b/g;

function escapeRegExp(s: string): string {
    return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function distinct(items: Iterable<string>): string[] {
    return [...new Set(items)];
}

/**
 * Drop citation ids that were not provided and strip their `[id]` markers from the text.
 */
export function repairOutput<T extends GenerationOutput>(output: T, providedIds: Iterable<string>): T {
    const provided = new Set(providedIds);
    return {
        ...output,
        citationsUsed: output.citationsUsed.filter(id => provided.has(id)),
        narrative: output.narrative.replace(CITATION_MARKER, (marker: string, id: string) =>
            provided.has(id) ? marker : ''
        ),
    };
}

/**
 * Capitalized identifier-looking substrings, distinct, in order of first appearance.
 */
export function extractCapitalizedTokens(text: string): string[] {
    return distinct(text.match(CAPITALIZED_TOKEN) ?? []);
}

export function lintOutput(
    output: GenerationOutput,
    allowedTokens: Iterable<string>,
    providedIds: Iterable<string>,
    bannedTerms: Iterable<string> = []
): LintResult {
    const allowed = new Set(allowedTokens);
    const valid = new Set(providedIds);
    const issues: string[] = [];

    for (const token of extractCapitalizedTokens(output.narrative)) {
        if (!allowed.has(token) && !LINT_EXEMPTIONS.has(token)) {
            issues.push(`unallowed token: ${token}`);
        }
    }

    const citations = distinct(output.citationsUsed);
    if (citations.length === 0) {
        issues.push('no citations used');
    }
    for (const id of citations) {
        if (!valid.has(id)) {
            issues.push(`bad citation id: ${id}`);
        }
    }

    for (const term of bannedTerms) {
        if (new RegExp(`\\b${escapeRegExp(term)}\\b`, 'i').test(output.narrative)) {
            issues.push(`unrepresentable term present: ${term}`);
        }
    }

    return { ok: issues.length === 0, issues };
}
