#!/usr/bin/env node

import './utils/stdioHygiene.js';

import { fileURLToPath } from 'url';
import { realpathSync } from 'fs';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { getTools, handleToolCall, type ToolExposureMode } from './tools/index.js';
import { checkDecoderDependencies } from './decode/nodeDecoder.js';
import { runConvertCli } from './cli/convert.js';
import { SERVER_NAME, SERVER_VERSION } from './constants.js';

const TOOL_MODE: ToolExposureMode = process.env.DWAR_TOOL_MODE === 'full' ? 'full' : 'standard';

const server = new Server(
  {
    name: SERVER_NAME,
    version: SERVER_VERSION,
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

server.setRequestHandler(ListToolsRequestSchema, async () => {
  return { tools: getTools(TOOL_MODE) };
});

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  return handleToolCall(request.params.name, request.params.arguments ?? {}, TOOL_MODE);
});

async function main() {
  if (process.argv[2] === 'convert') {
    process.exitCode = await runConvertCli(process.argv.slice(3));
    return;
  }

  try {
    const deps = checkDecoderDependencies();
    console.error(`[dwar-mcp] Decoder ready: Node.js ${deps.nodeVersion}, ${deps.scriptPath}`);
  } catch (err) {
    console.error('[dwar-mcp] Structure decoding unavailable:',
      err instanceof Error ? err.message : String(err));
    console.error('[dwar-mcp] *_SMILES columns will be empty until DWAR_DECODER_SCRIPT or DWAR_NODE_BIN is fixed');
  }

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`[dwar-mcp] Server started (${TOOL_MODE} mode)`);
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
    console.error('[dwar-mcp] Fatal:', err);
    process.exitCode = 1;
  });
}
