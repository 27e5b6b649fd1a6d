/**
 * In-memory data tables shared by the tests.
 */
import { createNarrativeContext, DataTables, NarrativeContext } from '../src/vocabulary/loader.js';
import type { GenerationOutput, GenerationRequest, NarrativeGeneratorLike } from '../src/types/index.js';

export function fixtureTables(): DataTables {
    return {
        symbols: {
            functions: ['ResetCallback', 'ResetGraph', 'VSync', 'PadInit', 'PadGetState', 'PadRead', 'CdInit', 'CdControl'],
            literals: ['VSync(0)'],
            enums: {
                'PAD_STATE_*': ['PadStateDiscon', 'PadStateStable'],
                'Cdl*': ['CdlPause', 'CdlSetloc'],
            },
        },
        relations: {
            ResetCallback: { requires: [], yields: [] },
            ResetGraph: { requires: ['ResetCallback'], yields: [] },
            VSync: { requires: ['ResetGraph'], yields: [] },
            'VSync(0)': { requires: ['VSync'], yields: [] },
            PadInit: { requires: [], yields: [] },
            PadGetState: { requires: ['PadInit'], yields: ['PAD_STATE_*'] },
            PadRead: { requires: ['PadInit'], yields: [] },
            CdInit: { requires: ['ResetCallback'], yields: [] },
            CdControl: { requires: ['CdInit'], yields: ['Cdl*'] },
        },
        lexicon: {
            lex2neutral: {
                controller: ['INPUT_DEVICE'],
                unplugged: ['INPUT_DISCONNECT'],
                button: ['INPUT_READ'],
                frame: ['FRAME_WAIT'],
                disc: ['DISC_ACCESS'],
                pause: ['DISC_PAUSE'],
                network: ['NETWORK'],
                maybe: [],
            },
            neutral2sdk: {
                INPUT_DEVICE: ['PadInit'],
                INPUT_DISCONNECT: ['PadGetState', 'PAD_STATE_*'],
                INPUT_READ: ['PadRead'],
                FRAME_WAIT: ['VSync', 'VSync(0)'],
                DISC_ACCESS: ['CdInit'],
                DISC_PAUSE: ['CdControl', 'Cdl*'],
                // NetOpen is not part of the vocabulary
                NETWORK: ['NetOpen'],
            },
        },
        passages: [
            { id: 'boot.p1', role: 'backbone', tokens: ['ResetCallback'], text: 'ResetCallback comes first.' },
            { id: 'pad.overview.p2', role: 'backbone', tokens: ['PadInit'], text: 'PadInit starts pad polling.' },
            { id: 'pad.state.p12', role: 'ordinary', tokens: ['PadGetState', 'PAD_STATE_*'], text: 'PadGetState reports PAD_STATE_* values.' },
            { id: 'pad.read.p14', role: 'ordinary', tokens: ['PadRead'], text: 'PadRead returns button bits.' },
            { id: 'vsync.p20', role: 'ordinary', tokens: ['VSync', 'VSync(0)'], text: 'VSync(0) waits for vertical blank.' },
            { id: 'gpu.reset.p47', role: 'ordinary', tokens: ['ResetGraph'], text: 'ResetGraph resets the GPU.' },
            { id: 'cd.init.p30', role: 'ordinary', tokens: ['CdInit'], text: 'CdInit resets the drive.' },
            { id: 'cd.control.p33', role: 'ordinary', tokens: ['CdControl', 'Cdl*'], text: 'CdControl issues Cdl* commands.' },
        ],
    };
}

export function fixtureContext(): NarrativeContext {
    return createNarrativeContext(fixtureTables());
}

/**
 * Generator stand-in returning a preset output and recording each request.
 */
export class FakeGenerator implements NarrativeGeneratorLike {
    public requests: GenerationRequest[] = [];

    constructor(private output: GenerationOutput) {}

    async generate(request: GenerationRequest): Promise<GenerationOutput> {
        this.requests.push(request);
        return { ...this.output };
    }
}
