/**
 * Configuration Types and Schemas
 * Centralized configuration management for the OpenProject bulk MCP server
 */

import { z } from 'zod';

// Environment type for configuration profiles
export enum Environment {
  DEVELOPMENT = 'development',
  TEST = 'test',
  PRODUCTION = 'production',
}

// OpenProject connection settings
export const OpenProjectConfigSchema = z.object({
  url: z.string().url().optional(),
  apiKey: z.string().min(1).optional(),
  requestTimeout: z.number().int().positive().default(30000),
});

export type OpenProjectConfig = z.infer<typeof OpenProjectConfigSchema>;

export const LoggingConfigSchema = z.object({
  level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  environment: z.nativeEnum(Environment).default(Environment.DEVELOPMENT),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

// Per-item retry policy for bulk operations (delays in milliseconds)
export const RetryConfigSchema = z
  .object({
    maxRetries: z.number().int().min(0).max(10).default(3),
    initialDelay: z.number().int().min(0).default(1000),
    maxDelay: z.number().int().min(0).default(16000),
    backoffFactor: z.number().min(1).default(2),
  })
  .refine((retry) => retry.maxDelay >= retry.initialDelay, {
    message: 'maxDelay must be greater than or equal to initialDelay',
    path: ['maxDelay'],
  });

export type RetryConfig = z.infer<typeof RetryConfigSchema>;

export const BulkConfigSchema = z.object({
  // Unset means every item of a batch is in flight at once
  maxConcurrency: z.number().int().positive().optional(),
});

export type BulkConfig = z.infer<typeof BulkConfigSchema>;

// Complete Application Configuration Schema
export const ApplicationConfigSchema = z.object({
  environment: z.nativeEnum(Environment).default(Environment.DEVELOPMENT),
  openproject: OpenProjectConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
  retry: RetryConfigSchema.default({}),
  bulk: BulkConfigSchema.default({}),
});

export type ApplicationConfig = z.infer<typeof ApplicationConfigSchema>;

// Configuration Validation Error
export class ConfigurationError extends Error {
  constructor(
    public readonly field: string,
    message: string,
    public readonly value?: unknown
  ) {
    super(`Configuration error in ${field}: ${message}`);
    this.name = 'ConfigurationError';
  }
}

// Configuration Load Options
export interface ConfigLoadOptions {
  /** Override default environment detection */
  environment?: Environment;
  /** Environment variables to read instead of process.env */
  env?: NodeJS.ProcessEnv;
  /** Additional configuration sources, merged last */
  sources?: Record<string, unknown>;
}
