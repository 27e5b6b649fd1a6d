import { parseGenerationOutput, extractFirstJsonObject } from '../../src/llm/outputParser.js';

describe('parseGenerationOutput', () => {
    test('parses a bare JSON reply', () => {
        const raw = '{"narrative":"I called PadInit [pad.overview.p2].","citationsUsed":["pad.overview.p2"],"tokensUsed":["PadInit"]}';
        expect(parseGenerationOutput(raw)).toEqual({
            narrative: 'I called PadInit [pad.overview.p2].',
            citationsUsed: ['pad.overview.p2'],
            tokensUsed: ['PadInit'],
        });
    });

    test('extracts an object wrapped in a code fence', () => {
        const raw = 'Here you go:\n```json\n{"narrative":"n","citationsUsed":["a"],"tokensUsed":[]}\n```';
        expect(parseGenerationOutput(raw)).toEqual({ narrative: 'n', citationsUsed: ['a'], tokensUsed: [] });
    });

    test('skips a malformed brace group and takes the next object', () => {
        const raw = 'see {not json} then {"narrative":"x"}';
        expect(parseGenerationOutput(raw)).toEqual({ narrative: 'x', citationsUsed: [], tokensUsed: [] });
    });

    test('braces inside string values do not end the object', () => {
        const raw = 'reply: {"narrative":"uses } and { inside","citationsUsed":[],"tokensUsed":[]} trailing';
        expect(parseGenerationOutput(raw).narrative).toBe('uses } and { inside');
    });

    test('fields of the wrong type fall back to empty values', () => {
        const raw = '{"narrative": 5, "citationsUsed": "x", "tokensUsed": ["A", 3], "mood": "calm"}';
        expect(parseGenerationOutput(raw)).toEqual({ narrative: '', citationsUsed: [], tokensUsed: [] });
    });

    test('reply without any object', () => {
        expect(parseGenerationOutput('I cannot help with that')).toEqual({
            narrative: '',
            citationsUsed: [],
            tokensUsed: [],
            parseError: 'no-json-object-found',
            raw: 'I cannot help with that',
        });
    });

    test('unterminated object', () => {
        expect(parseGenerationOutput('{"narrative": "half').parseError).toBe('no-json-object-found');
    });

    test('valid JSON that is not an object', () => {
        const out = parseGenerationOutput('["narrative"]');
        expect(out.parseError).toBe('not-a-json-object');
        expect(out.raw).toBe('["narrative"]');
    });

    test('a truncated reply does not fall back to a nested object', () => {
        const raw = 'Sure: {"narrative": "I call PadInit [p1]", "citationsUsed": ["p1"], "tokensUsed": ["PadInit"], "meta": {"words": 5}';
        expect(parseGenerationOutput(raw)).toEqual({
            narrative: '',
            citationsUsed: [],
            tokensUsed: [],
            parseError: 'no-output-fields',
            raw,
        });
    });

    test('a malformed outer object is reported, not replaced by its nested object', () => {
        const raw = '{"narrative": "I call PadInit", "citationsUsed": ["p1"], "meta": {"k": 1},}';
        const out = parseGenerationOutput(raw);
        expect(out.narrative).toBe('');
        expect(out.citationsUsed).toEqual([]);
        expect(out.raw).toBe(raw);
        expect(typeof out.parseError).toBe('string');
        expect(out.parseError).not.toBe('no-json-object-found');
        expect(out.parseError).not.toBe('no-output-fields');
    });

    test('an object without any output field is a parse error', () => {
        expect(parseGenerationOutput('{"answer": "PadInit"}')).toEqual({
            narrative: '',
            citationsUsed: [],
            tokensUsed: [],
            parseError: 'no-output-fields',
            raw: '{"answer": "PadInit"}',
        });
    });

    test('the last JSON error is reported when no candidate parses', () => {
        const out = parseGenerationOutput('prefix {bad: json} suffix');
        expect(typeof out.parseError).toBe('string');
        expect(out.parseError).not.toBe('no-json-object-found');
        expect(out.narrative).toBe('');
    });
});

describe('extractFirstJsonObject', () => {
    test('returns the first object with an output field, skipping nested braces of rejected ones', () => {
        expect(extractFirstJsonObject('a {"meta": {"narrative": "inner"}} b {"narrative": "outer"}')).toEqual({
            value: { narrative: 'outer' },
        });
    });

    test('reports absence', () => {
        expect(extractFirstJsonObject('plain text')).toEqual({ error: 'no-json-object-found' });
    });
});
