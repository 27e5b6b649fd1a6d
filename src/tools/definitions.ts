import { Tool } from '@modelcontextprotocol/sdk/types.js';

const tokenArray = {
    type: 'array',
    items: { type: 'string' },
};

const maxQuotesSchema = {
    type: 'integer',
    minimum: 0,
    description: 'Maximum number of evidence passages (default: 4)',
};

export const TOOLS: Tool[] = [
    {
        name: 'interpret-event',
        description: `Map free text to activated SDK symbols through the lexicon.

**Returns:** bagOfApi (activated symbols), unrepresentable (words with no lexicon entry),
tokens, and a state tableau of observable/callable symbols.

**Example:**
  text: "the controller was unplugged"
  → bagOfApi: ["PAD_STATE_*", "PadGetState", "PadInit"], unrepresentable: ["the", "was"]`,
        inputSchema: {
            type: 'object',
            properties: {
                text: { type: 'string', description: 'Free-text event description' },
            },
            required: ['text'],
        },
    },
    {
        name: 'expand-requires',
        description: `Compute the requires-closure of a set of symbols in dependency order.

**Returns:** allowedTokens (each symbol after its prerequisites) and prerequisites
(symbols pulled in only because something else required them).
Fails with CYCLE_DETECTED when the relation graph has a cycle.`,
        inputSchema: {
            type: 'object',
            properties: {
                tokens: { ...tokenArray, description: 'Activated symbols' },
            },
            required: ['tokens'],
        },
    },
    {
        name: 'select-passages',
        description: `Select evidence passages under the event-minimal policy.

Specific passages tied to the closure come first; backbone passages are used only
when they explain an indirectly required prerequisite.`,
        inputSchema: {
            type: 'object',
            properties: {
                tokens: { ...tokenArray, description: 'Activated symbols' },
                max_quotes: maxQuotesSchema,
            },
            required: ['tokens'],
        },
    },
    {
        name: 'lint-narrative',
        description: `Repair and check a narrative against the vocabulary and citation policy.

**Checks:** capitalized tokens outside allowed_tokens, missing citations,
citation ids outside provided_ids, banned terms (whole word, case-insensitive).
Set repair=false to lint the narrative exactly as given.`,
        inputSchema: {
            type: 'object',
            properties: {
                narrative: { type: 'string' },
                citations_used: tokenArray,
                tokens_used: tokenArray,
                allowed_tokens: tokenArray,
                provided_ids: tokenArray,
                banned_terms: tokenArray,
                repair: { type: 'boolean', description: 'Strip unprovided citations first (default: true)' },
            },
            required: ['narrative', 'citations_used', 'allowed_tokens', 'provided_ids'],
        },
    },
    {
        name: 'generate-narrative',
        description: `Run the full pipeline: interpret, expand, select evidence, generate, lint.

Inputs that activate no SDK symbol return a fixed fallback narrative without calling
the generation service. Policy violations are reported in 'issues', not as errors.`,
        inputSchema: {
            type: 'object',
            properties: {
                text: { type: 'string', description: 'Free-text event description' },
                max_quotes: maxQuotesSchema,
            },
            required: ['text'],
        },
    },
    {
        name: 'check-data',
        description: 'Cross-check the loaded vocabulary, lexicon, relation graph and passage corpus.',
        inputSchema: {
            type: 'object',
            properties: {},
        },
    },
];
