import type { LexiconMap } from '../types/index.js';

/**
 * Two-stage mapping: surface lexeme -> neutral tags -> vocabulary symbols.
 */
export class Lexicon {
    private readonly lexToNeutral: ReadonlyMap<string, readonly string[]>;
    private readonly neutralToSdk: ReadonlyMap<string, readonly string[]>;

    constructor(map: LexiconMap) {
        this.lexToNeutral = new Map(
            Object.entries(map.lex2neutral).map(([k, v]): [string, readonly string[]] => [k, Object.freeze([...v])])
        );
        this.neutralToSdk = new Map(
            Object.entries(map.neutral2sdk).map(([k, v]): [string, readonly string[]] => [k, Object.freeze([...v])])
        );
    }

    tagsFor(lexeme: string): readonly string[] {
        return this.lexToNeutral.get(lexeme) ?? [];
    }

    symbolsFor(tag: string): readonly string[] {
        return this.neutralToSdk.get(tag) ?? [];
    }

    /** A lexeme is mapped when it has at least one tag; an empty tag list counts as unmapped. */
    isMapped(lexeme: string): boolean {
        return this.tagsFor(lexeme).length > 0;
    }
}
