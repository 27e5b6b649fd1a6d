#!/usr/bin/env node
import 'dotenv/config';
import chalk from 'chalk';
import boxen from 'boxen';
import ora from 'ora';
import { input } from '@inquirer/prompts';
import { parseCliArgs } from './cliArgs.js';
import { loadConfig } from './config.js';
import { createContainer } from './container.js';
import { generateNarrative } from './orchestrator.js';
import { interpretEvent } from './interpreter.js';
import { loadDataTables, loadNarrativeContext } from './vocabulary/loader.js';
import { checkDataConsistency } from './vocabulary/consistency.js';
import { VERSION } from './types/index.js';

const HELP = `
Symbolic Narrator CLI v${VERSION}

Usage:
  symbolic-narrator narrate [--event <text>]   Generate a narrative for an event
  symbolic-narrator interpret <text>           Show activated symbols for some text
  symbolic-narrator check                      Cross-check the data tables

Options:
  --event <text>       Event description (prompted for when omitted)
  --max-quotes <n>     Maximum evidence passages (default: NARRATIVE_MAX_QUOTES or 4)
  --debug, -d          Print the raw generator reply
  --help, -h           Show this help
  --version, -v        Show version

Environment:
  NARRATIVE_DATA_DIR, NARRATIVE_PROVIDER (fetch | ai-sdk), OPENAI_BASE_URL,
  OPENAI_API_KEY, OPENAI_MODEL, OLLAMA_URL, OLLAMA_MODEL, LLM_TIMEOUT_MS

Examples:
  symbolic-narrator narrate --event "the controller was unplugged mid-game"
  symbolic-narrator interpret "the disc drive paused"
`;

async function runNarrate(event: string | undefined, maxQuotes: number | undefined, debug: boolean): Promise<void> {
    const config = loadConfig();
    const spinner = ora();

    const container = createContainer(config, {
        onRaw: debug
            ? raw => {
                spinner.stop();
                console.log(chalk.dim('\n[DEBUG] Raw generator content:\n') + raw + '\n');
            }
            : undefined,
    });

    const eventText = (event ?? (await input({ message: 'Enter the event description:' }))).trim();

    const result = await generateNarrative(container.context, container.generator, eventText, {
        maxQuotes: maxQuotes ?? config.maxQuotes,
        onProgress: (step, message) => {
            if (step === 'generate') {
                spinner.start(chalk.dim(message));
                return;
            }
            if (spinner.isSpinning) spinner.stop();
            console.log(`${chalk.cyan(`[${step}]`)} ${message}`);
        },
    });
    if (spinner.isSpinning) spinner.stop();

    console.log(chalk.bold('\n=== RESULT JSON ==='));
    console.log(JSON.stringify(result, null, 2));

    const verdict = result.ok ? chalk.green('✓ valid') : chalk.yellow(`✗ ${result.issues?.length ?? 0} issue(s)`);
    console.log(boxen(result.narrative || '<no narrative>', {
        title: `Narrative ${verdict}`,
        padding: 1,
        borderColor: result.ok ? 'green' : 'yellow',
    }));
}

function runInterpret(text: string): void {
    const context = loadNarrativeContext(loadConfig().dataDir);
    console.log(JSON.stringify(interpretEvent(context, text), null, 2));
}

function runCheck(): boolean {
    const report = checkDataConsistency(loadDataTables(loadConfig().dataDir));
    for (const error of report.errors) {
        console.log(chalk.red(`[ERR] ${error}`));
    }
    if (report.ok) {
        console.log(chalk.green('✓ Data tables are consistent'));
    }
    return report.ok;
}

async function main(): Promise<void> {
    const options = parseCliArgs(process.argv.slice(2));

    if (options.version) {
        console.log(VERSION);
        return;
    }
    if (options.help || !options.command) {
        console.log(HELP);
        return;
    }
    if (options.errors.length > 0) {
        for (const e of options.errors) console.error(chalk.red(`Error: ${e}`));
        process.exit(1);
    }

    switch (options.command) {
        case 'narrate':
            await runNarrate(options.event, options.maxQuotes, options.debug);
            break;
        case 'interpret': {
            const text = options.event ?? options.rest.join(' ');
            if (!text) {
                console.error(chalk.red('Error: text argument required'));
                process.exit(1);
            }
            runInterpret(text);
            break;
        }
        case 'check':
            process.exit(runCheck() ? 0 : 1);
            break;
        default:
            console.error(chalk.red(`Unknown command: ${options.command}`));
            console.log(HELP);
            process.exit(1);
    }
}

main().catch(e => {
    console.error(chalk.red(`[FATAL] ${e instanceof Error ? e.message : String(e)}`));
    process.exit(1);
});
