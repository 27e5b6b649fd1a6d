export interface CliOptions {
    command?: string;
    /** Non-flag arguments after the command */
    rest: string[];
    event?: string;
    maxQuotes?: number;
    debug: boolean;
    help: boolean;
    version: boolean;
    errors: string[];
}

/**
 * Accepts both `--flag value` and `--flag=value` forms for valued flags.
 */
export function parseCliArgs(args: string[]): CliOptions {
    const options: CliOptions = {
        rest: [],
        debug: false,
        help: false,
        version: false,
        errors: [],
    };
    const positional: string[] = [];

    const valueOf = (arg: string, name: string, i: number): [string | undefined, number] => {
        if (arg.startsWith(`${name}=`)) return [arg.slice(name.length + 1), i];
        if (i + 1 < args.length) return [args[i + 1], i + 1];
        options.errors.push(`${name} requires a value`);
        return [undefined, i];
    };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--event' || arg.startsWith('--event=')) {
            [options.event, i] = valueOf(arg, '--event', i);
        } else if (arg === '--max-quotes' || arg.startsWith('--max-quotes=')) {
            let raw: string | undefined;
            [raw, i] = valueOf(arg, '--max-quotes', i);
            if (raw !== undefined) {
                const n = Number(raw);
                if (Number.isInteger(n) && n >= 0) options.maxQuotes = n;
                else options.errors.push(`--max-quotes must be a non-negative integer, got '${raw}'`);
            }
        } else if (arg === '--debug' || arg === '-d') {
            options.debug = true;
        } else if (arg === '--help' || arg === '-h') {
            options.help = true;
        } else if (arg === '--version' || arg === '-v') {
            options.version = true;
        } else if (arg.startsWith('-')) {
            options.errors.push(`Unknown option: ${arg}`);
        } else {
            positional.push(arg);
        }
    }

    options.command = positional[0];
    options.rest = positional.slice(1);
    return options;
}
