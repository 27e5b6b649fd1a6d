/**
 * Static vocabulary tables: symbols, relation graph, lexicon and passage corpus.
 */

export type SymbolKind = 'function' | 'literal' | 'enum';

/** Raw shape of symbols.json */
export interface SymbolTable {
    functions: string[];
    literals: string[];
    /** Enumeration key -> member names */
    enums: Record<string, string[]>;
}

export interface RelationEntry {
    requires: string[];
    /** Domain-state identifiers the symbol produces (e.g. PAD_STATE_*) */
    yields: string[];
}

export type RelationGraph = Record<string, RelationEntry>;

/** Raw shape of neutral_map.json */
export interface LexiconMap {
    lex2neutral: Record<string, string[]>;
    neutral2sdk: Record<string, string[]>;
}

export type PassageRole = 'backbone' | 'ordinary';

export interface Passage {
    id: string;
    text: string;
    /** Symbols the passage substantiates */
    tokens: string[];
    role: PassageRole;
}

/** (id, text) pair handed to the generator */
export interface Quote {
    id: string;
    text: string;
}
