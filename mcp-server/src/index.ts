#!/usr/bin/env node
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { EnvConnectionProvider, loadConfig, loadDotenv } from './config';
import type { FileToolDeps } from './FileTools';
import { createLogger, setLogLevel } from './logger';
import { handleToolCall, tools } from './tools';

const SERVER_VERSION = '0.1.0';

loadDotenv();
const config = loadConfig();
setLogLevel(config.logLevel);

const log = createLogger('server');
log.info(`Server starting - v${SERVER_VERSION} - API ${config.apiVersion} - ${new Date().toISOString()}`);

const deps: FileToolDeps = {
  connections: new EnvConnectionProvider(),
  clientOptions: {
    apiVersion: config.apiVersion,
    timeoutMs: config.requestTimeoutMs,
  },
};

// ============================================================
// Server Setup
// ============================================================

const server = new Server(
  {
    name: 'salesforce-files-mcp-server',
    version: SERVER_VERSION,
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools }));

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;
  log.info(`Tool call: ${name}`);
  return handleToolCall(name, args, deps);
});

// ============================================================
// Main
// ============================================================

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((error: unknown) => {
  log.error(`Fatal: ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
  process.exit(1);
});
