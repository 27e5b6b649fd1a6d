#!/usr/bin/env node
/**
 * Symbolic Narrator - MCP entry point
 */

import 'dotenv/config';
import { runServer, SERVER_VERSION } from './server.js';

async function main(): Promise<void> {
    const args = process.argv.slice(2);

    if (args.includes('--help') || args.includes('-h')) {
        console.log(`
Symbolic Narrator MCP Server - event narratives in a controlled SDK vocabulary

Usage: symbolic-narrator-mcp [options]

Options:
  --help, -h     Show this help message
  --version, -v  Show version information

Tools:
  - interpret-event     Map free text to activated SDK symbols
  - expand-requires     Requires-closure in dependency order
  - select-passages     Event-minimal evidence selection
  - lint-narrative      Repair and check a narrative against the policy
  - generate-narrative  Full pipeline including the generation service
  - check-data          Cross-check the data tables

Resources:
  - narrator://data/{symbols,relations,lexicon,passages}

The server communicates via stdio using the Model Context Protocol.
`);
        process.exit(0);
    }

    if (args.includes('--version') || args.includes('-v')) {
        console.log(`symbolic-narrator version ${SERVER_VERSION}`);
        process.exit(0);
    }

    await runServer();
}

main().catch(error => {
    console.error('Failed to start server:', error);
    process.exit(1);
});
