/**
 * Requires-closure over the relation graph.
 *
 * Post-order depth-first walk: a symbol is emitted only after every symbol it
 * requires, each exactly once. Symbols are marked white (unseen), gray (being
 * expanded) or black (emitted); reaching a gray symbol means the graph has a cycle.
 */

import type { VocabularyStore } from './vocabulary/store.js';
import { NarrativeException, createCycleError } from './types/errors.js';

type Mark = 'gray' | 'black';

/**
 * Return `targets` plus everything they transitively require, in an order where
 * each symbol follows all of its requirements.
 *
 * @throws NarrativeException CYCLE_DETECTED when the walk re-enters a gray symbol
 */
export function expandWithRequires(vocabulary: VocabularyStore, targets: Iterable<string>): string[] {
    const out: string[] = [];
    const marks = new Map<string, Mark>();
    const stack: string[] = [];

    const visit = (symbol: string): void => {
        const mark = marks.get(symbol);
        if (mark === 'black') return;
        if (mark === 'gray') {
            throw createCycleError([...stack.slice(stack.indexOf(symbol)), symbol]);
        }

        marks.set(symbol, 'gray');
        stack.push(symbol);
        for (const required of vocabulary.requiresOf(symbol)) {
            visit(required);
        }
        stack.pop();
        marks.set(symbol, 'black');
        out.push(symbol);
    };

    for (const target of targets) {
        visit(target);
    }
    return out;
}

/**
 * Closure minus the targets themselves: what was pulled in only because
 * something else needed it.
 */
export function prerequisitesOnly(vocabulary: VocabularyStore, targets: Iterable<string>): Set<string> {
    const targetSet = new Set(targets);
    return new Set(expandWithRequires(vocabulary, targetSet).filter(s => !targetSet.has(s)));
}

/**
 * Walk the whole relation graph and return the first cycle found
 * (first and last element equal), or null when `requires` is acyclic.
 */
export function findRequiresCycle(vocabulary: VocabularyStore): string[] | null {
    try {
        expandWithRequires(vocabulary, vocabulary.relatedSymbols());
        return null;
    } catch (e) {
        if (e instanceof NarrativeException && e.code === 'CYCLE_DETECTED') {
            const cycle = e.error.details?.cycle;
            if (Array.isArray(cycle)) return cycle.map(String);
        }
        throw e;
    }
}
