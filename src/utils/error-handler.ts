/**
 * Error Handling with Security Patterns
 *
 * Converts anything a tool handler throws into an MCPError whose message is
 * safe to show to the agent host.
 */

import { MCPError, ErrorCode, isApiRequestError } from '../types/errors';

/**
 * Security-sensitive patterns that are masked in error messages
 */
const SECURITY_PATTERNS: Array<{ pattern: RegExp; replacement: string }> = [
  // Credentials in headers and URLs
  { pattern: /Basic\s+[A-Za-z0-9+/=]{8,}/g, replacement: 'Basic [REDACTED]' },
  { pattern: /Bearer\s+[A-Za-z0-9\-_.]+/g, replacement: 'Bearer [REDACTED]' },
  { pattern: /apikey:[^\s@]+/gi, replacement: 'apikey:[REDACTED]' },
  { pattern: /(https?:\/\/)[^/\s:@]+:[^/\s@]+@/g, replacement: '$1[REDACTED]@' },
  { pattern: /(api[_-]?key|token|password)=([^&\s]+)/gi, replacement: '$1=[REDACTED]' },
];

/**
 * Stack frames never reach the user
 */
const STACK_FRAME = /\n\s+at\s.*/g;

/**
 * Type-safe error handler that preserves messages while masking secrets
 */
class SecureErrorHandler {
  /**
   * Mask credentials and strip stack frames; everything else is kept as-is
   */
  sanitize(message: string): string {
    let sanitized = message.replace(STACK_FRAME, '');
    for (const { pattern, replacement } of SECURITY_PATTERNS) {
      sanitized = sanitized.replace(pattern, replacement);
    }
    return sanitized.trim() || 'Unknown error';
  }

  /**
   * Wrap tool errors with consistent handling
   */
  wrap(error: unknown, toolName: string): MCPError {
    if (isApiRequestError(error)) {
      return new MCPError(error.code, `${toolName} failed: ${this.sanitize(error.message)}`, error.details);
    }

    if (error instanceof MCPError) {
      const sanitized = this.sanitize(error.message);
      return sanitized === error.message ? error : new MCPError(error.code, sanitized, error.details);
    }

    const message = error instanceof Error ? error.message : typeof error === 'string' ? error : 'Unknown error';
    return new MCPError(ErrorCode.INTERNAL_ERROR, `${toolName} failed: ${this.sanitize(message)}`);
  }
}

// Create singleton instance
const errorHandler = new SecureErrorHandler();

export const sanitizeErrorMessage = (message: string): string => errorHandler.sanitize(message);

export const wrapToolError = (error: unknown, toolName: string): MCPError => errorHandler.wrap(error, toolName);

