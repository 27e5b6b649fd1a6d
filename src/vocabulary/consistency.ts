import type { DataTables } from './loader.js';
import { VocabularyStore } from './store.js';
import { findRequiresCycle } from '../resolver.js';

export interface ConsistencyReport {
    ok: boolean;
    errors: string[];
}

/**
 * Cross-check the data tables against each other.
 *
 * Reports symbols declared under more than one kind, lexicon symbols and passage
 * tokens missing from the vocabulary, lexicon tags with no symbol table entry,
 * duplicate passage ids and cycles in `requires`.
 */
export function checkDataConsistency(tables: DataTables): ConsistencyReport {
    const errors: string[] = [];
    const { symbols, lexicon, passages } = tables;

    const declared = new Map<string, string>();
    const kinds: Array<[string, string[]]> = [
        ['functions', symbols.functions],
        ['literals', symbols.literals],
        ['enums', Object.keys(symbols.enums)],
    ];
    for (const [kind, names] of kinds) {
        for (const name of names) {
            const previous = declared.get(name);
            if (previous !== undefined && previous !== kind) {
                errors.push(`symbol '${name}' declared in both ${previous} and ${kind}`);
            } else {
                declared.set(name, kind);
            }
        }
    }

    for (const [tag, targets] of Object.entries(lexicon.neutral2sdk)) {
        for (const symbol of targets) {
            if (!declared.has(symbol)) {
                errors.push(`neutral2sdk[${tag}] -> '${symbol}' not in symbols.json`);
            }
        }
    }

    const tags = new Set(Object.keys(lexicon.neutral2sdk));
    for (const [term, termTags] of Object.entries(lexicon.lex2neutral)) {
        const missing = [...new Set(termTags.filter(t => !tags.has(t)))].sort();
        if (missing.length > 0) {
            errors.push(`lex2neutral['${term}'] has unknown categories: ${missing.join(', ')}`);
        }
    }

    const ids = new Set<string>();
    for (const p of passages) {
        if (ids.has(p.id)) errors.push(`duplicate passage id '${p.id}'`);
        ids.add(p.id);
        for (const token of p.tokens) {
            if (!declared.has(token)) {
                errors.push(`passage '${p.id}' cites '${token}' not in symbols.json`);
            }
        }
    }

    const cycle = findRequiresCycle(new VocabularyStore(symbols, tables.relations));
    if (cycle) {
        errors.push(`requires cycle: ${cycle.join(' -> ')}`);
    }

    return { ok: errors.length === 0, errors };
}
