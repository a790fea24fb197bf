/**
 * Logging Configuration for the Option Edge Calculator
 *
 * Uses Winston for structured logging with file rotation.
 */

import winston from 'winston';
import { LOGGING } from '../core/constants.js';
import type { CalculatorError } from '../core/errors.js';

/**
 * What the calculator core needs from a logger. Passed in explicitly,
 * any winston logger satisfies it.
 */
export interface DiagnosticsLogger {
  error(message: string, meta?: Record<string, unknown>): unknown;
  warn(message: string, meta?: Record<string, unknown>): unknown;
  info(message: string, meta?: Record<string, unknown>): unknown;
  debug(message: string, meta?: Record<string, unknown>): unknown;
}

// ============================================================================
// LOG FORMATS
// ============================================================================

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
  winston.format.colorize({ all: true }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} [${level}] ${String(message)}${metaStr}`;
  })
);

const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.json()
);

// ============================================================================
// LOGGER INSTANCE
// ============================================================================

export const logger = winston.createLogger({
  level: process.env['LOG_LEVEL'] ?? LOGGING.DEFAULT_LEVEL,
  defaultMeta: { service: LOGGING.SERVICE_NAME },
  transports: [
    new winston.transports.Console({
      format: consoleFormat,
    }),
  ],
});

// Add file transports in non-test environments
if (process.env['NODE_ENV'] !== 'test') {
  const logDir = process.env['LOG_DIR'] ?? LOGGING.LOG_DIR;

  logger.add(
    new winston.transports.File({
      filename: `${logDir}error.log`,
      level: 'error',
      format: fileFormat,
      maxsize: LOGGING.FILE_MAX_SIZE,
      maxFiles: LOGGING.FILE_MAX_FILES,
    })
  );

  logger.add(
    new winston.transports.File({
      filename: `${logDir}combined.log`,
      format: fileFormat,
      maxsize: LOGGING.FILE_MAX_SIZE,
      maxFiles: LOGGING.FILE_MAX_FILES,
    })
  );
}

// ============================================================================
// SPECIALIZED LOGGERS
// ============================================================================

/**
 * Pricing logger - for evaluation diagnostics
 */
export const pricingLogger = logger.child({ component: 'pricing' });

/**
 * API logger - for HTTP request logging
 */
export const apiLogger = logger.child({ component: 'api' });

/**
 * CLI logger
 */
export const cliLogger = logger.child({ component: 'cli' });

/**
 * A logger that drops everything
 */
export function createSilentLogger(): winston.Logger {
  return winston.createLogger({
    silent: true,
    transports: [new winston.transports.Console()],
  });
}

// ============================================================================
// LOGGING UTILITIES
// ============================================================================

/**
 * Log a calculator error with full context
 */
export function logError(target: DiagnosticsLogger, error: CalculatorError): void {
  target.error(error.message, {
    code: error.code,
    context: error.context,
    stack: error.stack,
  });
}

// ============================================================================
// LOG LEVEL CONTROL
// ============================================================================

/**
 * Set log level at runtime
 */
export function setLogLevel(level: string): void {
  logger.level = level;
  logger.debug(`Log level set to ${level}`);
}

export function getLogLevel(): string {
  return logger.level;
}
