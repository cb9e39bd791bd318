import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { ApplicationConfigSchema } from '../src/config';
import { createServer, SERVER_NAME } from '../src';

jest.mock('../src/utils/logger');

describe('createServer', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should build a server with all tools registered', () => {
    const toolSpy = jest.spyOn(McpServer.prototype, 'tool');
    const config = ApplicationConfigSchema.parse({ bulk: { maxConcurrency: 5 } });

    const server = createServer(config, {
      url: 'https://op.example.test',
      apiKey: 'test-secret',
      requestTimeout: 30000,
    });

    expect(server).toBeInstanceOf(McpServer);
    expect(toolSpy).toHaveBeenCalledTimes(14);
    expect(SERVER_NAME).toBe('openproject-bulk-mcp');
  });
});
