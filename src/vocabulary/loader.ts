import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { VocabularyStore } from './store.js';
import { Lexicon } from './lexicon.js';
import { createDataInvalidError, createDataMissingError } from '../types/errors.js';
import type { LexiconMap, Passage, RelationGraph, SymbolTable } from '../types/index.js';

export const DATA_FILES = {
    symbols: 'symbols.json',
    relations: 'relations.json',
    lexicon: 'neutral_map.json',
    passages: 'manual_passages.json',
} as const;

export const DEFAULT_DATA_DIR = path.resolve(__dirname, '..', '..', 'data');

const stringList = z.array(z.string());

const symbolTableSchema = z.object({
    functions: stringList.default([]),
    literals: stringList.default([]),
    enums: z.record(z.string(), stringList).default({}),
});

const relationGraphSchema = z.record(
    z.string(),
    z.object({
        requires: stringList.default([]),
        yields: stringList.default([]),
    })
);

const lexiconMapSchema = z.object({
    lex2neutral: z.record(z.string(), stringList).default({}),
    neutral2sdk: z.record(z.string(), stringList).default({}),
});

const passagesSchema = z
    .array(
        z.object({
            id: z.string().min(1),
            text: z.string(),
            tokens: stringList.default([]),
            role: z.string().optional(),
        })
    )
    .transform((items): Passage[] =>
        items.map(p => ({
            id: p.id,
            text: p.text,
            tokens: p.tokens,
            role: p.role === 'backbone' ? 'backbone' : 'ordinary',
        }))
    );

/** The four tables as read from disk */
export interface DataTables {
    symbols: SymbolTable;
    relations: RelationGraph;
    lexicon: LexiconMap;
    passages: Passage[];
}

/**
 * Everything a pipeline call needs, constructed once at process start.
 */
export interface NarrativeContext {
    readonly vocabulary: VocabularyStore;
    readonly lexicon: Lexicon;
    readonly passages: readonly Passage[];
    readonly tables: Readonly<DataTables>;
}

function readTable<T>(dir: string, file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
    const filePath = path.join(dir, file);
    if (!fs.existsSync(filePath)) {
        throw createDataMissingError(filePath);
    }

    let json: unknown;
    try {
        json = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (e) {
        throw createDataInvalidError(filePath, e instanceof Error ? e.message : String(e));
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
        const reason = parsed.error.issues
            .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
            .join('; ');
        throw createDataInvalidError(filePath, reason);
    }
    return parsed.data;
}

/**
 * Read and validate the data files. Any missing or malformed file is fatal.
 */
export function loadDataTables(dataDir: string = DEFAULT_DATA_DIR): DataTables {
    return {
        symbols: readTable(dataDir, DATA_FILES.symbols, symbolTableSchema),
        relations: readTable(dataDir, DATA_FILES.relations, relationGraphSchema),
        lexicon: readTable(dataDir, DATA_FILES.lexicon, lexiconMapSchema),
        passages: readTable(dataDir, DATA_FILES.passages, passagesSchema),
    };
}

export function createNarrativeContext(tables: DataTables): NarrativeContext {
    const passages = Object.freeze(
        tables.passages.map(p => Object.freeze({ ...p, tokens: [...p.tokens] }))
    );
    return Object.freeze({
        vocabulary: new VocabularyStore(tables.symbols, tables.relations),
        lexicon: new Lexicon(tables.lexicon),
        passages,
        tables: Object.freeze({ ...tables }),
    });
}

export function loadNarrativeContext(dataDir: string = DEFAULT_DATA_DIR): NarrativeContext {
    return createNarrativeContext(loadDataTables(dataDir));
}
