#!/usr/bin/env node

/**
 * OpenProject Bulk MCP Server
 * Main entry point for the Model Context Protocol server
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import dotenv from 'dotenv';

import { ConfigurationManager, type ApplicationConfig } from './config';
import { OpenProjectClient } from './client/OpenProjectClient';
import { registerTools } from './tools';
import { BulkOperationProcessor } from './tools/work-packages/bulk';
import { logger, LogLevel, parseLogLevel } from './utils/logger';

export const SERVER_NAME = 'openproject-bulk-mcp';
export const SERVER_VERSION = '0.1.0';

/**
 * Build a server with every tool registered against the configured instance
 */
export function createServer(config: ApplicationConfig, connection: { url: string; apiKey: string; requestTimeout: number }): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  const client = new OpenProjectClient({
    baseUrl: connection.url,
    apiKey: connection.apiKey,
    timeout: connection.requestTimeout,
    userAgent: `${SERVER_NAME}/${SERVER_VERSION}`,
  });

  const processor = new BulkOperationProcessor(client, {
    retry: config.retry,
    ...(config.bulk.maxConcurrency !== undefined && { maxConcurrency: config.bulk.maxConcurrency }),
  });

  registerTools(server, client, processor);
  return server;
}

// Start the server
async function main(): Promise<void> {
  // Load environment variables
  dotenv.config({ quiet: true });

  const manager = ConfigurationManager.getInstance();
  const config = await manager.getConfiguration();
  logger.setLevel(parseLogLevel(config.logging.level) ?? LogLevel.INFO);

  const server = createServer(config, manager.requireConnection());
  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info('OpenProject bulk MCP server started');
}

// Only start the server if not in test environment
if (process.env.NODE_ENV !== 'test' && !process.env.JEST_WORKER_ID) {
  main().catch((error) => {
    logger.error('Failed to start server:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
}

export { MCPError, ErrorCode, ApiRequestError } from './types/errors';
export { logger } from './utils/logger';
export { withRetry, isRetryableError, calculateBackoffDelay, RETRY_CONFIG } from './utils/retry';
export { OpenProjectClient } from './client/OpenProjectClient';
export { BulkOperationProcessor, BulkOperationResult, MAX_BATCH_SIZE } from './tools/work-packages/bulk';
