import type { RelationGraph, SymbolKind, SymbolTable } from '../types/index.js';

const EMPTY: readonly string[] = Object.freeze([]);

interface FrozenRelation {
    readonly requires: readonly string[];
    readonly yields: readonly string[];
}

/**
 * Legal API symbols plus the requires/yields relation graph.
 * Built once from the data files and never mutated afterwards.
 */
export class VocabularyStore {
    private readonly kinds: ReadonlyMap<string, SymbolKind>;
    private readonly relations: ReadonlyMap<string, FrozenRelation>;

    constructor(symbols: SymbolTable, relations: RelationGraph = {}) {
        const kinds = new Map<string, SymbolKind>();
        // Later kinds do not overwrite earlier ones; the checker reports overlaps.
        for (const f of symbols.functions) if (!kinds.has(f)) kinds.set(f, 'function');
        for (const l of symbols.literals) if (!kinds.has(l)) kinds.set(l, 'literal');
        for (const e of Object.keys(symbols.enums)) if (!kinds.has(e)) kinds.set(e, 'enum');
        this.kinds = kinds;

        this.relations = new Map(
            Object.entries(relations).map(([symbol, entry]): [string, FrozenRelation] => [
                symbol,
                Object.freeze({
                    requires: Object.freeze([...entry.requires]),
                    yields: Object.freeze([...entry.yields]),
                }),
            ])
        );
    }

    /** True for function names, literal constants and enumeration keys */
    has(symbol: string): boolean {
        return this.kinds.has(symbol);
    }

    kindOf(symbol: string): SymbolKind | undefined {
        return this.kinds.get(symbol);
    }

    requiresOf(symbol: string): readonly string[] {
        return this.relations.get(symbol)?.requires ?? EMPTY;
    }

    yieldsOf(symbol: string): readonly string[] {
        return this.relations.get(symbol)?.yields ?? EMPTY;
    }

    /** Symbols that carry an entry in the relation graph */
    relatedSymbols(): string[] {
        return [...this.relations.keys()];
    }
}
