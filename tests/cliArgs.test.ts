import { parseCliArgs } from '../src/cliArgs.js';

describe('parseCliArgs', () => {
    test('command with separate-value flags', () => {
        expect(parseCliArgs(['narrate', '--event', 'the disc paused', '--max-quotes', '2', '-d'])).toEqual({
            command: 'narrate',
            rest: [],
            event: 'the disc paused',
            maxQuotes: 2,
            debug: true,
            help: false,
            version: false,
            errors: [],
        });
    });

    test('inline values', () => {
        const options = parseCliArgs(['interpret', '--event=frame drop', '--max-quotes=0']);
        expect(options.event).toBe('frame drop');
        expect(options.maxQuotes).toBe(0);
    });

    test('positional text after the command', () => {
        const options = parseCliArgs(['interpret', 'controller', 'unplugged']);
        expect(options.command).toBe('interpret');
        expect(options.rest).toEqual(['controller', 'unplugged']);
    });

    test('no arguments', () => {
        const options = parseCliArgs([]);
        expect(options.command).toBeUndefined();
        expect(options.errors).toEqual([]);
    });

    test('help and version', () => {
        expect(parseCliArgs(['-h']).help).toBe(true);
        expect(parseCliArgs(['--version']).version).toBe(true);
    });

    test('collects errors', () => {
        expect(parseCliArgs(['narrate', '--max-quotes', 'lots', '--verbose', '--event']).errors).toEqual([
            "--max-quotes must be a non-negative integer, got 'lots'",
            'Unknown option: --verbose',
            '--event requires a value',
        ]);
        expect(parseCliArgs(['--max-quotes=-1']).errors).toEqual(["--max-quotes must be a non-negative integer, got '-1'"]);
    });
});
