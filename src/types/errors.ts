/**
 * MCP Server Error Types and Utilities
 */

export enum ErrorCode {
  AUTH_FAILED = 'AUTH_FAILED',
  NOT_FOUND = 'NOT_FOUND',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  API_ERROR = 'API_ERROR',
  NETWORK_ERROR = 'NETWORK_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  RATE_LIMIT_EXCEEDED = 'RATE_LIMIT_EXCEEDED',
  TIMEOUT_ERROR = 'TIMEOUT_ERROR',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
}

/**
 * How a failed remote call should be treated by the retry executor.
 * `transient` failures may succeed on a later attempt; `client-error`
 * failures are rejections of the request itself.
 */
export type ApiErrorKind = 'transient' | 'client-error';

interface MCPErrorDetails {
  statusCode?: number;
  endpoint?: string;
  method?: string;
  responseBody?: string;
  limit?: number;
  current?: number;
  field?: string;
  itemIndex?: number;
}

export class MCPError extends Error {
  code: ErrorCode;
  details?: MCPErrorDetails;

  constructor(code: ErrorCode, message: string, details?: MCPErrorDetails) {
    super(message);
    this.code = code;
    if (details !== undefined) {
      this.details = details;
    }
    this.name = 'MCPError';
  }

  toJSON(): { error: { code: string; message: string; details?: unknown } } {
    return {
      error: {
        code: this.code,
        message: this.message,
        details: this.details,
      },
    };
  }
}

/**
 * Failure of a single OpenProject API request, classified at the source.
 */
export class ApiRequestError extends MCPError {
  readonly kind: ApiErrorKind;
  readonly statusCode: number | undefined;

  constructor(
    kind: ApiErrorKind,
    code: ErrorCode,
    message: string,
    details: MCPErrorDetails = {},
    options?: { cause?: unknown }
  ) {
    super(code, message, details);
    this.name = 'ApiRequestError';
    this.kind = kind;
    this.statusCode = details.statusCode;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Map an HTTP status onto an error code and retry classification.
 * 408 and 429 are the only 4xx statuses worth repeating.
 */
export function classifyHttpStatus(status: number): { kind: ApiErrorKind; code: ErrorCode } {
  switch (status) {
    case 401:
      return { kind: 'client-error', code: ErrorCode.AUTH_FAILED };
    case 403:
      return { kind: 'client-error', code: ErrorCode.PERMISSION_DENIED };
    case 404:
      return { kind: 'client-error', code: ErrorCode.NOT_FOUND };
    case 408:
      return { kind: 'transient', code: ErrorCode.TIMEOUT_ERROR };
    case 429:
      return { kind: 'transient', code: ErrorCode.RATE_LIMIT_EXCEEDED };
    default:
      if (status >= 500) {
        return { kind: 'transient', code: ErrorCode.API_ERROR };
      }
      return { kind: 'client-error', code: ErrorCode.VALIDATION_ERROR };
  }
}

export function isApiRequestError(error: unknown): error is ApiRequestError {
  return error instanceof ApiRequestError;
}
