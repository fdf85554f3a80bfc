#!/usr/bin/env node

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { errorDiag } from './core/errorBuilder.js';
import { groupErrors } from './core/format.js';
import type { Diagnostic } from './core/types.js';
import { countCrossings, layoutInput } from './input/index.js';
import { RankDirSchema } from './input/schema.js';

/**
 * MCP server exposing the layout engine.
 * Graphs are passed either as a JSON object or as its string form.
 */

const GraphArgSchema = z
  .union([z.string(), z.record(z.unknown())])
  .describe('Graph description: { options?, nodes, edges }, as an object or a JSON string');

const LayoutGraphSchema = z.object({
  graph: GraphArgSchema,
  engine: z.enum(['dagreish', 'conservative']).optional(),
  rankdir: RankDirSchema.optional(),
});

const CountCrossingsSchema = z.object({
  graph: GraphArgSchema,
});

function decodeGraph(graph: string | Record<string, unknown>): { input?: unknown; diagnostics: Diagnostic[] } {
  if (typeof graph !== 'string') return { input: graph, diagnostics: [] };
  try {
    return { input: JSON.parse(graph), diagnostics: [] };
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return { diagnostics: [errorDiag('GRAPH-JSON', `Invalid JSON: ${message}`)] };
  }
}

function textContent(payload: unknown) {
  return {
    content: [
      {
        type: 'text' as const,
        text: JSON.stringify(payload, null, 2),
      },
    ],
  };
}

function summary(diagnostics: Diagnostic[]) {
  const { errs, warns } = groupErrors(diagnostics);
  return {
    valid: errs.length === 0,
    errorCount: errs.length,
    warningCount: warns.length,
    errors: errs,
    warnings: warns,
  };
}

const GRAPH_PROPERTY = {
  description: 'Graph description with optional "options", a "nodes" array ({id, width, height, parent}) and an "edges" array ({v, w, name, minlen, weight, width, height, labelpos, labeloffset})',
};

async function startServer() {
  const server = new Server(
    {
      name: 'layerwise',
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [
      {
        name: 'layout_graph',
        description:
          'Compute a layered layout for a directed graph. Returns node coordinates, edge polylines, graph size ' +
          'and any diagnostics about the input.',
        inputSchema: {
          type: 'object',
          properties: {
            graph: GRAPH_PROPERTY,
            engine: {
              type: 'string',
              enum: ['dagreish', 'conservative'],
              description: 'Layout engine (default: dagreish)',
            },
            rankdir: {
              type: 'string',
              enum: ['TB', 'BT', 'LR', 'RL'],
              description: 'Overrides the direction given in the graph options',
            },
          },
          required: ['graph'],
        },
      },
      {
        name: 'count_crossings',
        description:
          'Order a directed graph and report the number of edge crossings before and after ordering, with the final layering.',
        inputSchema: {
          type: 'object',
          properties: {
            graph: GRAPH_PROPERTY,
          },
          required: ['graph'],
        },
      },
    ],
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      if (name === 'layout_graph') {
        const parsed = LayoutGraphSchema.parse(args);
        const decoded = decodeGraph(parsed.graph);
        if (decoded.input === undefined) return textContent({ ...summary(decoded.diagnostics), layout: null });
        const { result, diagnostics } = layoutInput(decoded.input, {
          engine: parsed.engine,
          overrides: parsed.rankdir ? { rankdir: parsed.rankdir } : undefined,
        });
        return textContent({ ...summary(diagnostics), layout: result ?? null });
      }

      if (name === 'count_crossings') {
        const parsed = CountCrossingsSchema.parse(args);
        const decoded = decodeGraph(parsed.graph);
        if (decoded.input === undefined) return textContent({ ...summary(decoded.diagnostics), crossings: null });
        const { report, diagnostics } = countCrossings(decoded.input);
        return textContent({ ...summary(diagnostics), ...(report ?? { crossings: null }) });
      }

      throw new Error(`Unknown tool: ${name}`);
    } catch (error) {
      if (error instanceof z.ZodError) {
        throw new Error(`Invalid arguments: ${error.message}`);
      }
      throw error;
    }
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);

  // stdout belongs to the transport
  console.error('layerwise MCP server started');
}

startServer().catch((error) => {
  console.error('Failed to start MCP server:', error);
  process.exit(1);
});
