import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerConnectionTool, testConnection } from '../../src/tools/connection';
import { ApiRequestError, ErrorCode } from '../../src/types/errors';
import { createMockApi, networkError } from '../utils/test-utils';

jest.mock('../../src/utils/logger');

describe('test_connection tool', () => {
  let api: ReturnType<typeof createMockApi>;

  beforeEach(() => {
    jest.useFakeTimers();
    api = createMockApi();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('should describe the instance and the user', async () => {
    api.testConnection.mockResolvedValue({ instanceName: 'Acme Projects', coreVersion: '14.2.0', userName: 'Test User' });

    const response = await testConnection(api);

    expect(response.content).toEqual([
      {
        type: 'text',
        text:
          '✅ **Connected to OpenProject**\n\n' +
          '**Instance**: Acme Projects\n' +
          '**Version**: 14.2.0\n' +
          '**User**: Test User\n',
      },
    ]);
  });

  it('should omit fields the server did not report', async () => {
    api.testConnection.mockResolvedValue({});

    const response = await testConnection(api);

    expect(response.content[0]?.text).toBe('✅ **Connected to OpenProject**\n\n');
  });

  it('should retry one transient failure after 500ms', async () => {
    api.testConnection.mockRejectedValueOnce(networkError('GET ')).mockResolvedValueOnce({ coreVersion: '14.2.0' });

    const promise = testConnection(api);
    await jest.advanceTimersByTimeAsync(500);
    const response = await promise;

    expect(api.testConnection).toHaveBeenCalledTimes(2);
    expect(response.content[0]?.text).toContain('**Version**: 14.2.0\n');
  });

  it('should report a rejected API key without retrying', async () => {
    api.testConnection.mockRejectedValue(
      new ApiRequestError(
        'client-error',
        ErrorCode.AUTH_FAILED,
        'API Error 401: Unauthenticated (Authentication failed. Please check your API key.)',
        { statusCode: 401 },
      ),
    );

    await expect(testConnection(api)).rejects.toMatchObject({
      code: ErrorCode.AUTH_FAILED,
      message:
        'test_connection failed: API Error 401: Unauthenticated (Authentication failed. Please check your API key.)',
    });
    expect(api.testConnection).toHaveBeenCalledTimes(1);
  });

  it('should register the tool', () => {
    const server = new McpServer({ name: 'test-server', version: '0.0.0' });
    const toolSpy = jest.spyOn(server, 'tool');

    registerConnectionTool(server, api);

    expect(toolSpy).toHaveBeenCalledTimes(1);
    expect(toolSpy.mock.calls[0]?.[0]).toBe('test_connection');
  });
});
