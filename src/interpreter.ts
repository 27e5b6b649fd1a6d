/**
 * Lexical interpretation: free text -> activated vocabulary symbols.
 *
 * Tokens map to neutral tags through the lexicon, tags map to symbols, and only
 * symbols present in the vocabulary survive. A token with no tag at all is
 * unrepresentable, whether or not its tags would have produced a symbol.
 */

import type { NarrativeContext } from './vocabulary/loader.js';
import type { VocabularyStore } from './vocabulary/store.js';
import type { InterpretationResult, StateTableau } from './types/index.js';

const SPLIT_PATTERN = /[^a-z0-9_]+/;

/**
 * Lowercase and split on anything outside [a-z0-9_]. Duplicates are kept.
 */
export function tokenize(text: string): string[] {
    return text.toLowerCase().split(SPLIT_PATTERN).filter(t => t.length > 0);
}

/**
 * Observable rows for symbols that yield a domain state, callable rows for
 * the remaining functions and literals. Enum keys get no row of their own.
 */
export function buildStateTableau(vocabulary: VocabularyStore, symbols: Iterable<string>): StateTableau {
    const observable: string[] = [];
    const callable: string[] = [];

    for (const symbol of [...symbols].sort()) {
        const yields = vocabulary.yieldsOf(symbol);
        const kind = vocabulary.kindOf(symbol);
        if (yields.length > 0) {
            observable.push(`${symbol} → ${yields[0]}`);
        } else if (kind === 'function' || kind === 'literal') {
            callable.push(symbol);
        }
    }

    return { observable, callable };
}

export function interpretEvent(ctx: NarrativeContext, text: string): InterpretationResult {
    const { lexicon, vocabulary } = ctx;
    const tokens = tokenize(text);

    const neutral = new Set<string>();
    for (const token of tokens) {
        for (const tag of lexicon.tagsFor(token)) neutral.add(tag);
    }

    const activated = new Set<string>();
    for (const tag of neutral) {
        for (const symbol of lexicon.symbolsFor(tag)) {
            if (vocabulary.has(symbol)) activated.add(symbol);
        }
    }

    const unrepresentable = [...new Set(tokens)].filter(t => !lexicon.isMapped(t)).sort();
    const bagOfApi = [...activated].sort();

    return {
        tokens,
        bagOfApi,
        unrepresentable,
        stateTableau: buildStateTableau(vocabulary, bagOfApi),
    };
}
