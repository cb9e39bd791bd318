/**
 * Retry with exponential backoff for single remote calls.
 *
 * Each call to withRetry owns its attempt counter and delay; nothing is
 * shared between concurrent invocations.
 */

import { isApiRequestError } from '../types/errors';
import { logger } from './logger';

/**
 * Interface for errors that have code properties (like Node.js system errors)
 */
interface ErrorWithCode extends Error {
  code?: string;
}

export interface RetryOptions {
  /** Retries after the first attempt */
  maxRetries?: number;
  /** Delay before the first retry, in milliseconds */
  initialDelay?: number;
  /** Upper bound for any single delay, in milliseconds */
  maxDelay?: number;
  backoffFactor?: number;
  shouldRetry?: (error: unknown) => boolean;
  /** Called before sleeping ahead of retry number `attempt` (1-based) */
  onRetry?: (error: unknown, attempt: number, delay: number) => void;
  /** Name used in log lines */
  label?: string;
}

type BackoffOptions = Required<Pick<RetryOptions, 'initialDelay' | 'maxDelay' | 'backoffFactor'>>;

const DEFAULT_OPTIONS: Required<Pick<RetryOptions, 'maxRetries' | 'initialDelay' | 'maxDelay' | 'backoffFactor'>> = {
  maxRetries: 3,
  initialDelay: 1000,
  maxDelay: 16000,
  backoffFactor: 2,
};

const RETRYABLE_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'ENOTFOUND',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

/**
 * Delay before retry `attemptIndex` (0 for the first retry).
 */
export function calculateBackoffDelay(attemptIndex: number, options: Partial<BackoffOptions> = {}): number {
  const initialDelay = options.initialDelay ?? DEFAULT_OPTIONS.initialDelay;
  const maxDelay = options.maxDelay ?? DEFAULT_OPTIONS.maxDelay;
  const backoffFactor = options.backoffFactor ?? DEFAULT_OPTIONS.backoffFactor;
  return Math.min(initialDelay * Math.pow(backoffFactor, attemptIndex), maxDelay);
}

function hasRetryableCode(error: ErrorWithCode): boolean {
  return typeof error.code === 'string' && RETRYABLE_CODES.has(error.code);
}

/**
 * Whether an error belongs to the network/connectivity/timeout class.
 *
 * Errors raised by the OpenProject client carry their own classification and
 * are trusted as-is; client errors (4xx) are never retryable.
 */
export function isRetryableError(error: unknown): boolean {
  if (isApiRequestError(error)) {
    return error.kind === 'transient';
  }

  if (!(error instanceof Error)) {
    return false;
  }

  if (error.name === 'AbortError' || error.name === 'TimeoutError') {
    return true;
  }

  if (hasRetryableCode(error)) {
    return true;
  }

  // undici reports socket failures as `TypeError: fetch failed` with the system error as cause
  if (error instanceof TypeError && error.message.toLowerCase().includes('fetch failed')) {
    return true;
  }

  if (error.cause instanceof Error && error.cause !== error) {
    return isRetryableError(error.cause);
  }

  return false;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

/**
 * Execute operation, retrying retryable failures with exponential backoff.
 *
 * Non-retryable errors propagate on the attempt that raised them. When every
 * attempt fails the last error propagates unchanged.
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxRetries = options.maxRetries ?? DEFAULT_OPTIONS.maxRetries;
  const shouldRetry = options.shouldRetry ?? isRetryableError;
  const label = options.label ?? 'operation';
  const totalAttempts = maxRetries + 1;

  for (let attempt = 0; ; attempt++) {
    try {
      const result = await operation();
      if (attempt > 0) {
        logger.info(`${label} succeeded on attempt ${attempt + 1}/${totalAttempts}`);
      }
      return result;
    } catch (error) {
      if (!shouldRetry(error)) {
        logger.debug(`${label} failed with non-retryable error: ${describeError(error)}`);
        throw error;
      }

      if (attempt >= maxRetries) {
        logger.warn(
          `${label} failed after ${totalAttempts} attempts (${maxRetries} retries exhausted): ${describeError(error)}`
        );
        throw error;
      }

      const delay = calculateBackoffDelay(attempt, options);
      logger.debug(
        `${label} attempt ${attempt + 1}/${totalAttempts} failed: ${describeError(error)}; retrying in ${delay}ms`
      );
      options.onRetry?.(error, attempt + 1, delay);
      await sleep(delay);
    }
  }
}

/**
 * Predefined retry configurations for different operation types
 */
export const RETRY_CONFIG = {
  BULK_OPERATIONS: {
    maxRetries: 3,
    initialDelay: 1000,
    maxDelay: 16000,
    backoffFactor: 2,
  },
  CONNECTION_CHECK: {
    maxRetries: 1,
    initialDelay: 500,
    maxDelay: 500,
    backoffFactor: 1,
  },
} as const;
