/**
 * Option Edge Calculator - Library Entry Point
 *
 * Black-Scholes fair value for European calls and puts, compared
 * against an observed market price to produce a trading signal.
 */

// Pricing
export * from './pricing/index.js';

// Signal
export { classify, assessEdge } from './signal/classifier.js';

// Evaluation
export { evaluate, parseRequest } from './evaluation/evaluate.js';
export type { EvaluateDeps } from './evaluation/evaluate.js';

// Surfaces
export { createApp, startServer } from './api/server.js';
export { runCLI } from './cli/index.js';

// Ambient
export { loadConfig, getConfig } from './config/index.js';
export {
  logger,
  pricingLogger,
  apiLogger,
  createSilentLogger,
  setLogLevel,
  getLogLevel,
} from './utils/logger.js';
export type { DiagnosticsLogger } from './utils/logger.js';
export * from './core/errors.js';
export type * from './core/types.js';
