/**
 * Connection Tool
 * Verifies that the configured OpenProject instance is reachable with the API key
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { OpenProjectApi } from '../types/openproject';
import { logger } from '../utils/logger';
import { wrapToolError } from '../utils/error-handler';
import { RETRY_CONFIG, withRetry } from '../utils/retry';
import type { ToolResponse } from './work-packages-bulk';

export async function testConnection(api: OpenProjectApi): Promise<ToolResponse> {
  try {
    const info = await withRetry(() => api.testConnection(), {
      ...RETRY_CONFIG.CONNECTION_CHECK,
      label: 'Connection test',
    });

    let text = '✅ **Connected to OpenProject**\n\n';
    if (info.instanceName) text += `**Instance**: ${info.instanceName}\n`;
    if (info.coreVersion) text += `**Version**: ${info.coreVersion}\n`;
    if (info.userName) text += `**User**: ${info.userName}\n`;

    return { content: [{ type: 'text', text }] };
  } catch (error) {
    logger.error('Connection test failed:', error instanceof Error ? error.message : String(error));
    throw wrapToolError(error, 'test_connection');
  }
}

export function registerConnectionTool(server: McpServer, api: OpenProjectApi): void {
  server.tool('test_connection', 'Check that the OpenProject API is reachable and the API key is accepted', () =>
    testConnection(api),
  );
}
