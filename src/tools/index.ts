/**
 * Tool Registration
 * Registers all OpenProject bulk tools with the MCP server
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { OpenProjectApi } from '../types/openproject';
import type { BulkOperationProcessor } from './work-packages/bulk';

import { registerConnectionTool } from './connection';
import { registerWorkPackageBulkTools } from './work-packages-bulk';

export function registerTools(server: McpServer, api: OpenProjectApi, processor: BulkOperationProcessor): void {
  registerConnectionTool(server, api);
  registerWorkPackageBulkTools(server, processor);
}
