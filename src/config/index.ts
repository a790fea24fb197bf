/**
 * Configuration Management for the Option Edge Calculator
 *
 * Loads configuration from environment variables and an optional config file.
 * Validates configuration using Zod schemas.
 */

import { z } from 'zod';
import dotenv from 'dotenv';
import { readFileSync, existsSync } from 'fs';
import { ConfigurationError } from '../core/errors.js';
import { SERVER, LOGGING } from '../core/constants.js';
import { logger } from '../utils/logger.js';
import type { AppConfig } from '../core/types.js';

// Load environment variables
dotenv.config();

// ============================================================================
// CONFIGURATION SCHEMA
// ============================================================================

const serverConfigSchema = z.object({
  host: z.string().min(1, 'Server host is required').default(SERVER.DEFAULT_HOST),
  port: z.number().int().min(1).max(65535).default(SERVER.DEFAULT_PORT),
});

const loggingConfigSchema = z.object({
  level: z
    .enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
    .default(LOGGING.DEFAULT_LEVEL),
});

const appConfigSchema = z.object({
  server: serverConfigSchema,
  logging: loggingConfigSchema,
});

// ============================================================================
// CONFIGURATION LOADING
// ============================================================================

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  forceReload?: boolean;
}

let cachedConfig: AppConfig | null = null;

/**
 * Load configuration from environment and config file
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const { env = process.env, forceReload = false } = options;

  if (cachedConfig && !forceReload) {
    return cachedConfig;
  }

  logger.debug('Loading configuration...');

  let rawConfig: Record<string, unknown> = {
    server: {
      host: env['HOST'] ?? SERVER.DEFAULT_HOST,
      port: parseEnvNumber(env['PORT']) ?? SERVER.DEFAULT_PORT,
    },
    logging: {
      level: env['LOG_LEVEL'] ?? LOGGING.DEFAULT_LEVEL,
    },
  };

  // Load config file if exists
  const configPath = env['CONFIG_PATH'] ?? './config/default.json';
  if (existsSync(configPath)) {
    try {
      const fileConfig: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));
      if (isRecord(fileConfig)) {
        rawConfig = deepMerge(rawConfig, fileConfig);
      }
      logger.debug(`Loaded config file: ${configPath}`);
    } catch (error) {
      logger.warn(`Failed to load config file: ${configPath}`, { error: String(error) });
    }
  }

  const result = appConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration:\n${errors.join('\n')}`, {
      issues: errors,
    });
  }

  cachedConfig = result.data;

  logger.debug('Configuration loaded', {
    host: cachedConfig.server.host,
    port: cachedConfig.server.port,
    logLevel: cachedConfig.logging.level,
  });

  return cachedConfig;
}

export interface ConfigOverrides {
  port?: string;
}

/**
 * Apply command-line overrides on top of a loaded config
 */
export function applyOverrides(config: AppConfig, overrides: ConfigOverrides): AppConfig {
  if (overrides.port === undefined) {
    return config;
  }

  const port = serverConfigSchema.shape.port.safeParse(Number(overrides.port));
  if (!port.success) {
    throw new ConfigurationError(`Invalid port: ${overrides.port}`, {
      issues: port.error.issues.map(issue => issue.message),
    });
  }

  return { ...config, server: { ...config.server, port: port.data } };
}

/**
 * Get current config (throws if not loaded)
 */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    throw new ConfigurationError('Configuration not loaded. Call loadConfig() first.');
  }
  return cachedConfig;
}

/**
 * Drop the cached config
 */
export function resetConfig(): void {
  cachedConfig = null;
}

// ============================================================================
// UTILITY FUNCTIONS
// ============================================================================

function parseEnvNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const num = Number(value);
  return isNaN(num) ? undefined : num;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = target[key];
    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}
