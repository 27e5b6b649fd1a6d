import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { callTool, createServer, toolHandlers } from '../src/server.js';
import { TOOLS } from '../src/tools/definitions.js';
import { loadConfig } from '../src/config.js';
import { NarrativeGenerator } from '../src/llm/generator.js';
import { createGenerationError } from '../src/types/errors.js';
import type { NarratorContainer } from '../src/container.js';
import type { LLMMessage, LLMProvider, LLMResponse, PipelineStep } from '../src/types/index.js';
import { fixtureContext } from './fixtures.js';

class StubProvider implements LLMProvider {
    public reply: string | Error = '{}';

    async complete(_messages: LLMMessage[]): Promise<LLMResponse> {
        if (this.reply instanceof Error) throw this.reply;
        return { content: this.reply };
    }
}

function makeContainer(provider: LLMProvider): NarratorContainer {
    return {
        config: loadConfig({}),
        context: fixtureContext(),
        llmProvider: provider,
        generator: new NarrativeGenerator(provider),
    };
}

async function call(name: string, args: unknown, container: NarratorContainer) {
    const result = await callTool(name, args, container);
    const parsed: unknown = JSON.parse(result.content[0].text);
    return { isError: result.isError, body: parsed };
}

describe('MCP tools', () => {
    let provider: StubProvider;
    let container: NarratorContainer;

    beforeEach(() => {
        provider = new StubProvider();
        container = makeContainer(provider);
    });

    test('every declared tool has a handler', () => {
        expect(TOOLS.map(t => t.name).sort()).toEqual(Object.keys(toolHandlers).sort());
    });

    test('interpret-event', async () => {
        const { isError, body } = await call('interpret-event', { text: 'controller unplugged' }, container);
        expect(isError).toBeUndefined();
        expect(body).toMatchObject({
            tokens: ['controller', 'unplugged'],
            bagOfApi: ['PAD_STATE_*', 'PadGetState', 'PadInit'],
            unrepresentable: [],
        });
    });

    test('expand-requires', async () => {
        const { body } = await call('expand-requires', { tokens: ['VSync'] }, container);
        expect(body).toEqual({
            allowedTokens: ['ResetCallback', 'ResetGraph', 'VSync'],
            prerequisites: ['ResetCallback', 'ResetGraph'],
        });
    });

    test('select-passages honours max_quotes', async () => {
        const { body } = await call('select-passages', { tokens: ['VSync'], max_quotes: 2 }, container);
        expect(body).toEqual({
            passages: [
                { id: 'vsync.p20', text: 'VSync(0) waits for vertical blank.' },
                { id: 'gpu.reset.p47', text: 'ResetGraph resets the GPU.' },
            ],
            providedIds: ['vsync.p20', 'gpu.reset.p47'],
        });
    });

    test('lint-narrative repairs by default', async () => {
        const args = {
            narrative: 'I used CdInit [x]',
            citations_used: ['x'],
            allowed_tokens: ['PadInit'],
            provided_ids: ['p1'],
        };

        expect((await call('lint-narrative', args, container)).body).toEqual({
            ok: false,
            issues: ['unallowed token: CdInit', 'no citations used'],
            narrative: 'I used CdInit ',
            citationsUsed: [],
        });
        expect((await call('lint-narrative', { ...args, repair: false }, container)).body).toEqual({
            ok: false,
            issues: ['unallowed token: CdInit', 'bad citation id: x'],
            narrative: 'I used CdInit [x]',
            citationsUsed: ['x'],
        });
    });

    test('generate-narrative runs the pipeline and reports progress', async () => {
        provider.reply = '```json\n{"narrative":"I polled PadGetState [pad.state.p12].","citationsUsed":["pad.state.p12"],"tokensUsed":["PadGetState"]}\n```';
        const steps: PipelineStep[] = [];

        const result = await callTool('generate-narrative', { text: 'the controller was unplugged' }, container, step =>
            steps.push(step)
        );

        expect(result.isError).toBeUndefined();
        expect(JSON.parse(result.content[0].text)).toEqual({
            narrative: 'I polled PadGetState [pad.state.p12].',
            citationsUsed: ['pad.state.p12'],
            tokensUsed: ['PadGetState'],
            ok: true,
            activatedTokens: ['PAD_STATE_*', 'PadGetState', 'PadInit'],
            allowedTokens: ['PAD_STATE_*', 'PadInit', 'PadGetState'],
            providedIds: ['pad.state.p12'],
        });
        expect(steps[steps.length - 1]).toBe('lint');
    });

    test('generation failures come back as error results', async () => {
        provider.reply = createGenerationError('HTTP 500: boom', { status: 500 });

        const { isError, body } = await call('generate-narrative', { text: 'frame' }, container);

        expect(isError).toBe(true);
        expect(body).toMatchObject({ code: 'GENERATION_FAILED', message: 'Generation service failed: HTTP 500: boom' });
    });

    test('check-data', async () => {
        const { body } = await call('check-data', {}, container);
        expect(body).toEqual({ ok: false, errors: ["neutral2sdk[NETWORK] -> 'NetOpen' not in symbols.json"] });
    });

    test('invalid arguments', async () => {
        const { isError, body } = await call('expand-requires', { tokens: 'VSync' }, container);
        expect(isError).toBe(true);
        expect(body).toEqual({
            code: 'INVALID_ARGUMENT',
            message: 'Invalid arguments for expand-requires: tokens: Expected array, received string',
            details: { tool: 'expand-requires' },
        });
    });

    test('empty event text is rejected', async () => {
        const { isError, body } = await call('generate-narrative', { text: '' }, container);
        expect(isError).toBe(true);
        expect(body).toMatchObject({ code: 'INVALID_ARGUMENT' });
    });

    test('unknown tool', async () => {
        const { isError, body } = await call('prove', {}, container);
        expect(isError).toBe(true);
        expect(body).toEqual({ code: 'UNKNOWN_TOOL', message: 'Unknown tool: prove' });
    });

    test('createServer builds a server without connecting', () => {
        expect(createServer(container)).toBeInstanceOf(Server);
    });
});
