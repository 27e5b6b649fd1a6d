/**
 * Event-minimal evidence selection.
 *
 * Specific passages tied to any symbol of the closure come first. Backbone
 * (foundational) passages are admitted afterwards, and only when they explain a
 * prerequisite that the closure pulled in indirectly.
 */

import type { NarrativeContext } from './vocabulary/loader.js';
import type { Passage, Quote } from './types/index.js';
import { DEFAULTS } from './types/options.js';
import { expandWithRequires, prerequisitesOnly } from './resolver.js';

function touches(passage: Passage, symbols: ReadonlySet<string>): boolean {
    return passage.tokens.some(t => symbols.has(t));
}

/**
 * Select at most `maxQuotes` distinct passages, in selection order.
 */
export function selectPassages(
    ctx: NarrativeContext,
    activated: Iterable<string>,
    maxQuotes: number = DEFAULTS.maxQuotes
): Quote[] {
    const activatedSet = new Set(activated);
    const closure = new Set(expandWithRequires(ctx.vocabulary, activatedSet));
    const prereqOnly = prerequisitesOnly(ctx.vocabulary, activatedSet);

    const chosen: Quote[] = [];
    const seen = new Set<string>();
    if (maxQuotes <= 0) return chosen;

    const take = (p: Passage): boolean => {
        chosen.push({ id: p.id, text: p.text });
        seen.add(p.id);
        return chosen.length >= maxQuotes;
    };

    for (const p of ctx.passages) {
        if (seen.has(p.id) || p.role === 'backbone') continue;
        if (touches(p, closure) && take(p)) return chosen;
    }

    for (const p of ctx.passages) {
        if (seen.has(p.id) || p.role !== 'backbone') continue;
        if (touches(p, prereqOnly) && take(p)) break;
    }

    return chosen;
}
