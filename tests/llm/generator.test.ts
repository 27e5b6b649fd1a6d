import { NarrativeGenerator, buildMessages, SYSTEM_PROMPT } from '../../src/llm/generator.js';
import { createGenerationError } from '../../src/types/errors.js';
import type { GenerationRequest, LLMMessage, LLMProvider, LLMResponse } from '../../src/types/index.js';

class ScriptedProvider implements LLMProvider {
    public calls: LLMMessage[][] = [];

    constructor(private reply: string | Error) {}

    async complete(messages: LLMMessage[]): Promise<LLMResponse> {
        this.calls.push(messages);
        if (this.reply instanceof Error) throw this.reply;
        return { content: this.reply };
    }
}

const request: GenerationRequest = {
    allowedTokens: ['PadInit', 'PadGetState'],
    passages: [{ id: 'pad.state.p12', text: 'PadGetState reports PAD_STATE_* values.' }],
    eventBrief: 'the controller was unplugged',
};

describe('buildMessages', () => {
    test('system prompt then a JSON user message', () => {
        const messages = buildMessages(request);
        expect(messages).toHaveLength(2);
        expect(messages[0]).toEqual({ role: 'system', content: SYSTEM_PROMPT });
        expect(messages[1].role).toBe('user');

        const user: unknown = JSON.parse(messages[1].content);
        expect(user).toMatchObject({
            EventBrief: 'the controller was unplugged',
            AllowedTokens: ['PadInit', 'PadGetState'],
            Passages: [{ id: 'pad.state.p12', text: 'PadGetState reports PAD_STATE_* values.' }],
        });
    });

    test('system prompt asks for JSON with the three keys', () => {
        expect(SYSTEM_PROMPT).toContain('Return ONLY JSON with keys: narrative, citationsUsed, tokensUsed.');
    });
});

describe('NarrativeGenerator', () => {
    test('parses the provider reply', async () => {
        const provider = new ScriptedProvider('{"narrative":"I saw it","citationsUsed":["pad.state.p12"],"tokensUsed":[]}');
        const generator = new NarrativeGenerator(provider);

        const output = await generator.generate(request);

        expect(output).toEqual({ narrative: 'I saw it', citationsUsed: ['pad.state.p12'], tokensUsed: [] });
        expect(provider.calls).toHaveLength(1);
    });

    test('hands the raw reply to onRaw', async () => {
        const onRaw = jest.fn();
        const generator = new NarrativeGenerator(new ScriptedProvider('not json'), { onRaw });

        const output = await generator.generate(request);

        expect(onRaw).toHaveBeenCalledWith('not json');
        expect(output.parseError).toBe('no-json-object-found');
    });

    test('transport failures propagate', async () => {
        const generator = new NarrativeGenerator(new ScriptedProvider(createGenerationError('HTTP 500: boom')));
        await expect(generator.generate(request)).rejects.toMatchObject({ error: { code: 'GENERATION_FAILED' } });
    });
});
