#!/usr/bin/env node

import { logServer } from './utils/stdioHygiene.js';

import { fileURLToPath } from 'url';
import { realpathSync } from 'fs';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { TOOL_MODE_ENV } from './constants.js';
import { getTools, handleToolCall, type ToolExposureMode } from './tools/index.js';

export function toolModeFromEnv(): ToolExposureMode {
  return process.env[TOOL_MODE_ENV] === 'full' ? 'full' : 'standard';
}

export function createServer(mode: ToolExposureMode = toolModeFromEnv()): Server {
  const server = new Server(
    {
      name: 'gto-formats-mcp',
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: getTools(mode) };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    return handleToolCall(request.params.name, request.params.arguments ?? {}, mode);
  });

  return server;
}

async function main() {
  const mode = toolModeFromEnv();
  const server = createServer(mode);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logServer(`Server started (${mode} mode)`);
}

const isExecutedAsScript = (() => {
  try {
    const entryPath = process.argv[1] ? realpathSync(process.argv[1]) : '';
    const modulePath = fileURLToPath(import.meta.url);
    return entryPath === modulePath;
  } catch {
    return false;
  }
})();

if (isExecutedAsScript) {
  main().catch(err => {
    logServer('Fatal:', err);
    process.exitCode = 1;
  });
}
