/**
 * MCP Protocol Adapter
 * Exposes longest-path computation as an MCP tool
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { Logger } from '../core/interfaces.js';
import { PathwiseError } from '../core/errors.js';
import { match } from '../core/result.js';
import { buildGraph, GraphDefinitionSchema } from '../graph/graph-builder.js';
import { PathService, summaryToJSON } from '../services/path-service.js';
import { readVersion } from '../version.js';

// Zod schema for MCP protocol validation
const LongestPathSchema = GraphDefinitionSchema.extend({
  start: z.number().int().nonnegative().optional(),
});

const errorResponse = (error: PathwiseError): CallToolResult => ({
  content: [{
    type: 'text',
    text: JSON.stringify({
      error: error.message,
      code: error.code,
      context: error.context,
    }, null, 2),
  }],
  isError: true,
});

const jsonResponse = (payload: unknown): CallToolResult => ({
  content: [{
    type: 'text',
    text: JSON.stringify(payload, null, 2),
  }],
});

export class MCPAdapter {
  private readonly server: Server;

  constructor(
    private readonly pathService: PathService,
    private readonly logger: Logger
  ) {
    this.server = new Server(
      {
        name: 'pathwise',
        version: readVersion(),
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.setupHandlers();
  }

  /**
   * Get the MCP server instance for starting
   */
  getServer(): Server {
    return this.server;
  }

  /**
   * Dispatch a tool call by name
   */
  callTool(name: string, args: unknown): CallToolResult {
    this.logger.debug('MCP tool call received', { tool: name });

    switch (name) {
      case 'LongestPath':
        return this.handleLongestPath(args);
      default:
        // ARCHITECTURE: Return error response instead of throwing
        return {
          content: [{
            type: 'text',
            text: JSON.stringify({
              error: `Unknown tool: ${name}`,
              code: 'INVALID_TOOL',
            }, null, 2),
          }],
          isError: true,
        };
    }
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(CallToolRequestSchema, async (request) =>
      this.callTool(request.params.name, request.params.arguments)
    );

    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: [
        {
          name: 'LongestPath',
          description:
            'Length (edge count) of the longest directed path from a vertex. ' +
            'Fails with CYCLE_DETECTED when a cycle is reachable from the start.',
          inputSchema: {
            type: 'object',
            properties: {
              vertices: {
                type: 'array',
                items: { type: 'integer', minimum: 0 },
                description: 'Optional vertex ids, in reporting order (allows isolated vertices)',
              },
              edges: {
                type: 'array',
                items: {
                  type: 'array',
                  prefixItems: [
                    { type: 'integer', minimum: 0 },
                    { type: ['integer', 'null'], minimum: 0 },
                  ],
                  minItems: 2,
                  maxItems: 2,
                },
                description: 'Directed edges as [from, to] pairs, in attachment order',
              },
              start: {
                type: 'integer',
                minimum: 0,
                description: 'Start vertex id. Omit to compute the length for every vertex',
              },
            },
            required: ['edges'],
          },
        },
      ],
    }));
  }

  private handleLongestPath(args: unknown): CallToolResult {
    // Validate input at boundary
    const parseResult = LongestPathSchema.safeParse(args);
    if (!parseResult.success) {
      return {
        content: [{
          type: 'text',
          text: `Validation error: ${parseResult.error.message}`,
        }],
        isError: true,
      };
    }

    const { start, ...definition } = parseResult.data;
    const graphResult = buildGraph(definition);
    if (!graphResult.ok) {
      return errorResponse(graphResult.error);
    }
    const graph = graphResult.value;

    if (start !== undefined) {
      return match(this.pathService.longestFrom(graph, start), {
        ok: (report) => jsonResponse(report),
        err: errorResponse,
      });
    }

    return match(this.pathService.longestForAll(graph), {
      ok: (summary) => jsonResponse(summaryToJSON(summary)),
      err: errorResponse,
    });
  }
}
