/**
 * uml2owl MCP Server
 *
 * MCP server exposing the UML → OWL pipeline.
 * Includes: convert-uml, inspect-uml, map-uml, validate-ontology,
 * generate-ontology and list-benchmarks.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
    CallToolRequestSchema,
    ListToolsRequestSchema,
    ListResourcesRequestSchema,
    ReadResourceRequestSchema,
    ListPromptsRequestSchema,
    GetPromptRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { listResources, getResourceContent } from './resources/index.js';
import { listPrompts, getPrompt } from './prompts/index.js';

import {
    PipelineException,
    createInvalidArgumentError,
    serializePipelineError,
} from './types/index.js';
import * as Handlers from './handlers/index.js';
import { TOOLS } from './tools/definitions.js';
import { createContainer, ServerContainer } from './container.js';
import { VERSION } from './version.js';

type ProgressCallback = (progress: number | undefined, message: string) => void;

type ToolHandler = (
    args: Record<string, unknown>,
    container: ServerContainer,
    options?: { onProgress?: ProgressCallback }
) => Promise<unknown> | unknown;

const toolHandlers: Record<string, ToolHandler> = {
    'convert-uml': (args, c, opts) =>
        Handlers.convertHandler(args, c.config.baseIri, opts?.onProgress),

    'inspect-uml': (args) =>
        Handlers.inspectHandler(args),

    'map-uml': (args, c) =>
        Handlers.mapHandler(args, c.config.baseIri),

    'validate-ontology': (args) =>
        Handlers.validateOntologyHandler(args),

    'generate-ontology': (args, c) =>
        Handlers.generateOntologyHandler(args, c.generator, c.benchmarkStore),

    'list-benchmarks': (args, c) =>
        Handlers.listBenchmarksHandler(args, c.benchmarkStore),
};

export interface ToolCallResult {
    [key: string]: unknown;
    content: Array<{ type: 'text'; text: string }>;
    isError?: boolean;
}

/**
 * Run one tool and wrap the outcome as MCP text content.
 * Structured pipeline errors come back as `isError` results.
 */
export async function handleToolCall(
    name: string,
    rawArgs: Record<string, unknown> | undefined,
    container: ServerContainer,
    onProgress?: ProgressCallback
): Promise<ToolCallResult> {
    const args = rawArgs ?? {};

    try {
        if (!Object.prototype.hasOwnProperty.call(toolHandlers, name)) {
            throw createInvalidArgumentError(`Unknown tool: ${name}`, { tools: Object.keys(toolHandlers) });
        }
        const result = await toolHandlers[name](args, container, { onProgress });

        return {
            content: [
                {
                    type: 'text',
                    text: JSON.stringify(result, null, 2),
                },
            ],
        };
    } catch (error) {
        // Handle structured PipelineException
        if (error instanceof PipelineException) {
            return {
                content: [
                    {
                        type: 'text',
                        text: JSON.stringify(serializePipelineError(error.error), null, 2),
                    },
                ],
                isError: true,
            };
        }

        // Handle generic errors
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
export function createServer(container: ServerContainer = createContainer()): Server {
    const server = new Server(
        {
            name: 'uml2owl',
            version: VERSION,
        },
        {
            capabilities: {
                tools: {},
                resources: {},
                prompts: {},
            },
        }
    );

    server.setRequestHandler(ListToolsRequestSchema, async () => {
        return { tools: TOOLS };
    });

    // ==================== MCP RESOURCES HANDLERS ====================

    server.setRequestHandler(ListResourcesRequestSchema, async () => {
        return {
            resources: listResources().map(r => ({
                uri: r.uri,
                name: r.name,
                description: r.description,
                mimeType: r.mimeType,
            })),
        };
    });

    server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
        const { uri } = request.params;
        const content = getResourceContent(uri);
        const resource = listResources().find(r => r.uri === uri);

        if (content === null || resource === undefined) {
            throw createInvalidArgumentError(`Resource not found: ${uri}`);
        }

        return {
            contents: [
                {
                    uri,
                    mimeType: resource.mimeType,
                    text: content,
                },
            ],
        };
    });

    // ==================== MCP PROMPTS HANDLERS ====================

    server.setRequestHandler(ListPromptsRequestSchema, async () => {
        return {
            prompts: listPrompts().map(p => ({
                name: p.name,
                description: p.description,
                arguments: p.arguments,
            })),
        };
    });

    server.setRequestHandler(GetPromptRequestSchema, async (request) => {
        const { name, arguments: promptArgs } = request.params;
        const result = getPrompt(name, promptArgs || {});

        if (result === null) {
            throw createInvalidArgumentError(`Prompt not found: ${name}`);
        }

        return {
            description: result.description,
            messages: result.messages,
        };
    });

    server.setRequestHandler(CallToolRequestSchema, async (request) => {
        const { name, arguments: rawArgs } = request.params;

        const progressToken = request.params._meta?.progressToken;
        const onProgress: ProgressCallback | undefined = progressToken !== undefined
            ? (progress, message) => {
                server
                    .notification({
                        method: 'notifications/progress',
                        params: {
                            progressToken,
                            progress: progress ?? 0,
                            total: 1,
                            message,
                        },
                    })
                    .catch((e: unknown) => console.error('Failed to send progress notification:', e));
            }
            : undefined;

        return handleToolCall(name, rawArgs, container, onProgress);
    });

    return server;
}

/**
 * Run the MCP server
 */
export async function runServer(): Promise<void> {
    const server = createServer();
    const transport = new StdioServerTransport();
    await server.connect(transport);
    console.error(`uml2owl MCP server ${VERSION} listening on stdio`);
}
