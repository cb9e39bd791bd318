/**
 * Centralized Configuration Manager
 * Replaces scattered process.env usage with type-safe configuration management
 */

import { z } from 'zod';
import type {
  ApplicationConfig,
  BulkConfig,
  ConfigLoadOptions,
  LoggingConfig,
  OpenProjectConfig,
  RetryConfig,
} from './types';
import { Environment, ConfigurationError, ApplicationConfigSchema } from './types';
import { logger } from '../utils/logger';

type EnvironmentProfile = {
  logging?: Partial<LoggingConfig>;
};

const ENVIRONMENT_PROFILES: Record<Environment, EnvironmentProfile> = {
  [Environment.DEVELOPMENT]: {
    logging: {
      level: 'debug' as const,
      environment: Environment.DEVELOPMENT,
    },
  },

  [Environment.TEST]: {
    logging: {
      level: 'error' as const,
      environment: Environment.TEST,
    },
  },

  [Environment.PRODUCTION]: {
    logging: {
      level: 'info' as const,
      environment: Environment.PRODUCTION,
    },
  },
};

/**
 * Environment variable → configuration path. Numeric variables are parsed
 * before validation so the schema reports bad values by name.
 */
// `flag` mappings apply their value only when the variable is "true"; later entries win.
const ENV_MAPPINGS: Array<{ variable: string; path: [string, string]; numeric?: boolean; flag?: string }> = [
  { variable: 'OPENPROJECT_URL', path: ['openproject', 'url'] },
  { variable: 'OPENPROJECT_API_KEY', path: ['openproject', 'apiKey'] },
  { variable: 'OPENPROJECT_TIMEOUT_MS', path: ['openproject', 'requestTimeout'], numeric: true },
  { variable: 'DEBUG', path: ['logging', 'level'], flag: 'debug' },
  { variable: 'LOG_LEVEL', path: ['logging', 'level'] },
  { variable: 'BULK_MAX_RETRIES', path: ['retry', 'maxRetries'], numeric: true },
  { variable: 'BULK_RETRY_INITIAL_DELAY_MS', path: ['retry', 'initialDelay'], numeric: true },
  { variable: 'BULK_RETRY_MAX_DELAY_MS', path: ['retry', 'maxDelay'], numeric: true },
  { variable: 'BULK_RETRY_BACKOFF_FACTOR', path: ['retry', 'backoffFactor'], numeric: true },
  { variable: 'BULK_MAX_CONCURRENCY', path: ['bulk', 'maxConcurrency'], numeric: true },
];

/**
 * Centralized Configuration Manager
 */
export class ConfigurationManager {
  private static instance: ConfigurationManager | null = null;
  private config: ApplicationConfig | null = null;
  private readonly loadOptions: ConfigLoadOptions;

  private constructor(options: ConfigLoadOptions = {}) {
    this.loadOptions = options;
  }

  /**
   * Get singleton instance of ConfigurationManager
   */
  public static getInstance(options?: ConfigLoadOptions): ConfigurationManager {
    if (!ConfigurationManager.instance) {
      ConfigurationManager.instance = new ConfigurationManager(options);
    }
    return ConfigurationManager.instance;
  }

  /**
   * Reset singleton instance (for testing)
   */
  public static reset(): void {
    ConfigurationManager.instance = null;
  }

  /**
   * Load and validate configuration from multiple sources
   */
  public loadConfiguration(): ApplicationConfig {
    if (this.config) {
      return this.config;
    }

    const environment = this.detectEnvironment();
    const profileConfig = ENVIRONMENT_PROFILES[environment];
    const envConfig = this.loadFromEnvironmentVariables();
    const sourceConfig = this.loadOptions.sources ?? {};

    // sources override env vars, env vars override profile
    const rawConfig = this.deepMerge({ environment }, profileConfig, envConfig, sourceConfig);

    this.config = this.validateConfiguration(rawConfig);
    this.logConfigurationSummary();

    return this.config;
  }

  /**
   * Get current configuration (load if not already loaded)
   */
  public async getConfiguration(): Promise<ApplicationConfig> {
    if (!this.config) {
      return Promise.resolve(this.loadConfiguration());
    }
    return this.config;
  }

  public async getOpenProjectConfig(): Promise<OpenProjectConfig> {
    const config = await this.getConfiguration();
    return config.openproject;
  }

  public async getLoggingConfig(): Promise<LoggingConfig> {
    const config = await this.getConfiguration();
    return config.logging;
  }

  public async getRetryConfig(): Promise<RetryConfig> {
    const config = await this.getConfiguration();
    return config.retry;
  }

  public async getBulkConfig(): Promise<BulkConfig> {
    const config = await this.getConfiguration();
    return config.bulk;
  }

  /**
   * Connection settings with url and apiKey guaranteed present
   */
  public requireConnection(): Required<OpenProjectConfig> {
    const { openproject } = this.loadConfiguration();
    if (!openproject.url || !openproject.apiKey) {
      throw new ConfigurationError(
        'openproject',
        'Missing required environment variables: OPENPROJECT_URL and OPENPROJECT_API_KEY must be set'
      );
    }
    return {
      url: openproject.url,
      apiKey: openproject.apiKey,
      requestTimeout: openproject.requestTimeout,
    };
  }

  private get env(): NodeJS.ProcessEnv {
    return this.loadOptions.env ?? process.env;
  }

  /**
   * Detect current environment
   */
  private detectEnvironment(): Environment {
    if (this.loadOptions.environment) {
      return this.loadOptions.environment;
    }

    const nodeEnv = this.env.NODE_ENV?.toLowerCase();
    const jestWorker = this.env.JEST_WORKER_ID;

    if (jestWorker || nodeEnv === 'test') {
      return Environment.TEST;
    }

    if (nodeEnv === 'production') {
      return Environment.PRODUCTION;
    }

    return Environment.DEVELOPMENT;
  }

  /**
   * Load configuration from environment variables
   */
  private loadFromEnvironmentVariables(): Record<string, unknown> {
    const result: Record<string, Record<string, unknown>> = {};

    for (const mapping of ENV_MAPPINGS) {
      const raw = this.env[mapping.variable];
      if (raw === undefined || raw.trim() === '') continue;

      const [section, key] = mapping.path;
      let value: unknown = raw.trim();
      if (mapping.flag !== undefined) {
        if (raw.trim() !== 'true') continue;
        value = mapping.flag;
      } else if (mapping.numeric) {
        const parsed = Number(raw);
        if (Number.isNaN(parsed)) {
          throw new ConfigurationError(mapping.variable, `expected a number, received "${raw}"`, raw);
        }
        value = parsed;
      }

      const sectionValues = result[section] ?? {};
      sectionValues[key] = value;
      result[section] = sectionValues;
    }

    return result;
  }

  /**
   * Deep merge multiple configuration objects
   */
  private deepMerge(...objects: Array<Record<string, unknown>>): Record<string, unknown> {
    const result: Record<string, unknown> = {};

    for (const obj of objects) {
      for (const key of Object.keys(obj)) {
        const current = result[key];
        const incoming = obj[key];
        if (isPlainObject(current) && isPlainObject(incoming)) {
          result[key] = this.deepMerge(current, incoming);
        } else {
          result[key] = incoming;
        }
      }
    }

    return result;
  }

  /**
   * Validate configuration using Zod schema
   */
  private validateConfiguration(rawConfig: unknown): ApplicationConfig {
    try {
      return ApplicationConfigSchema.parse(rawConfig);
    } catch (error) {
      if (error instanceof z.ZodError) {
        const errors = error.errors.map((err) => ({
          path: err.path.join('.'),
          message: err.message,
        }));

        throw new ConfigurationError(
          'validation',
          `Configuration validation failed:\n${errors.map((e) => `  - ${e.path}: ${e.message}`).join('\n')}`,
          { errors }
        );
      }
      throw error;
    }
  }

  /**
   * Log configuration summary without sensitive values
   */
  private logConfigurationSummary(): void {
    if (!this.config) return;

    const summary = {
      environment: this.config.environment,
      openproject: {
        hasUrl: !!this.config.openproject.url,
        hasApiKey: !!this.config.openproject.apiKey,
        requestTimeout: this.config.openproject.requestTimeout,
      },
      logging: this.config.logging,
      retry: this.config.retry,
      bulk: this.config.bulk,
    };

    logger.debug('Configuration loaded successfully', summary);
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

