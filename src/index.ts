#!/usr/bin/env node

// N+1 TODO MCP Server
// Exposes the TODO file of the working directory to agents and editors:
// list, check, accept by hand, migrate.

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { DetectionCoordinator } from './coordinator.js';
import { TestContext } from './test-context.js';
import { TOOL_DEFINITIONS, handleToolCall } from './tools.js';
import { stderrLogger } from './logger.js';

// --- Process-level crash protection ---
// Fail fast: unknown state is worse than no server.

process.on('uncaughtException', (error) => {
  stderrLogger.warn(`FATAL: Uncaught exception — exiting. ${error.message}`);
  if (error.stack) stderrLogger.warn(`Stack: ${error.stack}`);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  stderrLogger.warn(`FATAL: Unhandled rejection — exiting. ${error.message}`);
  if (error.stack) stderrLogger.warn(`Stack: ${error.stack}`);
  process.exit(1);
});

// --- Server setup ---

// The server is never inside a test; don't sniff its own stack for one
const coordinator = DetectionCoordinator.fromSettings({
  testContext: new TestContext({ sniffStack: false }),
});

const server = new Server(
  { name: 'n1-todo', version: '0.1.0' },
  { capabilities: { tools: {} } }
);

server.setRequestHandler(ListToolsRequestSchema, async () => ({
  tools: TOOL_DEFINITIONS,
}));

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;
  const result = await handleToolCall(coordinator, name, args);
  return { content: result.content, isError: result.isError };
});

async function main() {
  const transport = new StdioServerTransport();

  process.stdin.on('close', () => {
    stderrLogger.info('stdin closed. Exiting.');
    process.exit(0);
  });
  process.stdout.on('error', (error) => {
    stderrLogger.warn(`stdout error (pipe broken?): ${error.message}`);
    process.exit(0);
  });

  await server.connect(transport);
  stderrLogger.info(`Server started for ${coordinator.todoFilePath}`);

  const shutdown = () => {
    stderrLogger.info('Shutting down gracefully.');
    process.exit(0);
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  stderrLogger.warn(`Fatal startup error: ${error instanceof Error ? error.message : String(error)}`);
  if (error instanceof Error && error.stack) stderrLogger.warn(`Stack: ${error.stack}`);
  process.exit(1);
});
