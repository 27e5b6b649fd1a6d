/**
 * MCP Narrator Server
 *
 * MCP server exposing the narrative pipeline and its stages as tools:
 * interpret-event, expand-requires, select-passages, lint-narrative,
 * generate-narrative and check-data, plus the data tables as resources.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
    CallToolRequestSchema,
    ListToolsRequestSchema,
    ListResourcesRequestSchema,
    ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { listResources, readResource } from './resources/index.js';
import {
    NarrativeException,
    createGenericError,
    serializeNarrativeError,
    VERSION,
} from './types/index.js';
import type { PipelineStep } from './types/index.js';
import * as Handlers from './handlers/narrative.js';
import { TOOLS } from './tools/definitions.js';
import { createContainer, NarratorContainer } from './container.js';

export const SERVER_VERSION = VERSION;

type ToolHandler = (
    args: unknown,
    container: NarratorContainer,
    options: { onProgress?: (step: PipelineStep, message: string) => void }
) => Promise<unknown> | unknown;

export const toolHandlers: Record<string, ToolHandler> = {
    'interpret-event': (args, c) =>
        Handlers.interpretEventHandler(args, c.context),

    'expand-requires': (args, c) =>
        Handlers.expandRequiresHandler(args, c.context),

    'select-passages': (args, c) =>
        Handlers.selectPassagesHandler(args, c.context),

    'lint-narrative': (args) =>
        Handlers.lintNarrativeHandler(args),

    'generate-narrative': (args, c, opts) =>
        Handlers.generateNarrativeHandler(args, c.context, c.generator, c.config.maxQuotes, opts.onProgress),

    'check-data': (_args, c) =>
        Handlers.checkDataHandler(c.context),
};

/**
 * Run one tool call and shape the MCP result. Structured errors come back as
 * `isError` results instead of protocol errors.
 */
export async function callTool(
    name: string,
    args: unknown,
    container: NarratorContainer,
    onProgress?: (step: PipelineStep, message: string) => void
): Promise<{ content: Array<{ type: 'text'; text: string }>; isError?: boolean }> {
    try {
        const handler = toolHandlers[name];
        if (!handler) {
            throw createGenericError('UNKNOWN_TOOL', `Unknown tool: ${name}`);
        }

        const result = await handler(args, container, { onProgress });

        return {
            content: [
                {
                    type: 'text',
                    text: JSON.stringify(result, null, 2),
                },
            ],
        };
    } catch (error) {
        if (error instanceof NarrativeException) {
            return {
                content: [
                    {
                        type: 'text',
                        text: JSON.stringify(serializeNarrativeError(error.error), null, 2),
                    },
                ],
                isError: true,
            };
        }

        const errorMessage = error instanceof Error ? error.message : String(error);
        return {
            content: [
                {
                    type: 'text',
                    text: JSON.stringify({
                        error: errorMessage,
                        type: error instanceof Error ? error.constructor.name : 'Error',
                    }),
                },
            ],
            isError: true,
        };
    }
}

/**
 * Create and configure the MCP server
 */
export function createServer(container: NarratorContainer = createContainer()): Server {
    const server = new Server(
        {
            name: 'symbolic-narrator',
            version: SERVER_VERSION,
        },
        {
            capabilities: {
                tools: {},
                resources: {},
            },
        }
    );

    server.setRequestHandler(ListToolsRequestSchema, async () => {
        return { tools: TOOLS };
    });

    server.setRequestHandler(ListResourcesRequestSchema, async () => {
        return { resources: listResources() };
    });

    server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
        return readResource(request.params.uri, container.context);
    });

    server.setRequestHandler(CallToolRequestSchema, async (request) => {
        const { name, arguments: args } = request.params;

        const progressToken = request.params._meta?.progressToken;
        let progress = 0;
        const onProgress = progressToken !== undefined
            ? (step: PipelineStep, message: string) => {
                progress += 1;
                server
                    .notification({
                        method: 'notifications/progress',
                        params: { progressToken, progress, message: `[${step}] ${message}` },
                    })
                    .catch((e: unknown) => console.error('Failed to send progress notification:', e));
            }
            : undefined;

        return callTool(name, args ?? {}, container, onProgress);
    });

    return server;
}

/**
 * Run the MCP server over stdio
 */
export async function runServer(): Promise<void> {
    const server = createServer();
    const transport = new StdioServerTransport();
    await server.connect(transport);
}
