#!/usr/bin/env node

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import axios from 'axios';
import { describeError } from './errors.js';
import { TOOLS, handleTool, type ApiMethod } from './tools.js';

/**
 * SweepScope MCP Server
 *
 * Exposes the SweepScope HTTP API as MCP tools so agents can list captures,
 * build average/waterfall/peak/envelope charts, subtract a noise floor,
 * look up band allocations and trigger rtl_power sweeps.
 *
 * Usage:
 *   npm run mcp
 *   SWEEPSCOPE_URL=http://host:3410 npm run mcp
 *
 * stdout carries the protocol; all logging goes to stderr.
 */

const API_BASE = process.env.SWEEPSCOPE_URL || 'http://localhost:3410';

const server = new Server(
  { name: 'sweepscope', version: '0.1.0' },
  { capabilities: { tools: {} } }
);

// ── Request Handlers ──────────────────────────────────────────────

server.setRequestHandler(ListToolsRequestSchema, async () => ({
  tools: Object.entries(TOOLS).map(([name, def]) => ({
    name,
    description: def.description,
    inputSchema: def.inputSchema,
  })),
}));

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;

  try {
    const result = await handleTool(name, args || {}, api);
    return {
      content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
    };
  } catch (error) {
    return {
      content: [{ type: 'text', text: `Error: ${describeError(error)}` }],
      isError: true,
    };
  }
});

async function api(method: ApiMethod, path: string, data?: unknown): Promise<unknown> {
  const resp = await axios.request<unknown>({ method, url: `${API_BASE}${path}`, data, timeout: 30000 });
  return resp.data;
}

// ── Main ──────────────────────────────────────────────────────────

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`[sweepscope-mcp] Server running, ${Object.keys(TOOLS).length} tools available`);
  console.error(`[sweepscope-mcp] API: ${API_BASE}`);
}

main().catch((err) => {
  console.error('[sweepscope-mcp] Fatal:', err);
  process.exit(1);
});
