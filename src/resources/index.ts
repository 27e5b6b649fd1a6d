/**
 * MCP Resources: read-only views of the loaded data tables.
 */
import type { NarrativeContext } from '../vocabulary/loader.js';
import { createGenericError } from '../types/errors.js';

export interface Resource {
    uri: string;
    name: string;
    description: string;
    mimeType: string;
}

type TableKey = 'symbols' | 'relations' | 'lexicon' | 'passages';

const TABLE_RESOURCES: Array<Resource & { table: TableKey }> = [
    {
        uri: 'narrator://data/symbols',
        name: 'Vocabulary symbols',
        description: 'Functions, literals and enumerations of the target API',
        mimeType: 'application/json',
        table: 'symbols',
    },
    {
        uri: 'narrator://data/relations',
        name: 'Relation graph',
        description: 'requires/yields edges per symbol',
        mimeType: 'application/json',
        table: 'relations',
    },
    {
        uri: 'narrator://data/lexicon',
        name: 'Lexicon',
        description: 'lex2neutral and neutral2sdk maps',
        mimeType: 'application/json',
        table: 'lexicon',
    },
    {
        uri: 'narrator://data/passages',
        name: 'Passage corpus',
        description: 'Evidence passages with the symbols they substantiate',
        mimeType: 'application/json',
        table: 'passages',
    },
];

export function listResources(): Resource[] {
    return TABLE_RESOURCES.map(({ table: _table, ...resource }) => resource);
}

/**
 * JSON text of the table behind `uri`, or null for an unknown URI.
 */
export function getResourceContent(uri: string, ctx: NarrativeContext): string | null {
    const resource = TABLE_RESOURCES.find(r => r.uri === uri);
    if (!resource) return null;
    return JSON.stringify(ctx.tables[resource.table], null, 2);
}

/**
 * MCP read-resource result for `uri`.
 * @throws NarrativeException INVALID_ARGUMENT, with the URI in details, for an unknown URI
 */
export function readResource(
    uri: string,
    ctx: NarrativeContext
): { contents: Array<{ uri: string; mimeType: string; text: string }> } {
    const text = getResourceContent(uri, ctx);
    if (text === null) {
        throw createGenericError('INVALID_ARGUMENT', `Resource not found: ${uri}`, { uri });
    }
    return { contents: [{ uri, mimeType: 'application/json', text }] };
}
