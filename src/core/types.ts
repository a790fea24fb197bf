/**
 * Type Definitions for the Option Edge Calculator
 *
 * All monetary and rate values inside the core are Decimal.
 * Numbers appear only in presentation results.
 */

import type { Decimal } from 'decimal.js';
import type { CalculatorError } from './errors.js';

// ============================================================================
// PRICING TYPES
// ============================================================================

export type OptionVariant = 'CALL' | 'PUT';

/**
 * Canonical Black-Scholes inputs (fractional rates, annualized time)
 */
export interface PricingInputs {
  spot: Decimal;
  strike: Decimal;
  volatility: Decimal;      // As decimal, e.g., 0.20 for 20%
  riskFreeRate: Decimal;    // As decimal, may be zero or negative
  timeToExpiry: Decimal;    // In years
  variant: OptionVariant;
}

export interface PricingResult {
  theoreticalPrice: Decimal;
}

// ============================================================================
// SIGNAL TYPES
// ============================================================================

export type Recommendation =
  | 'Strong Buy'
  | 'Consider Buy'
  | 'Neutral'
  | 'Consider Sell'
  | 'Strong Sell';

export interface EdgeAssessment {
  edge: Decimal;            // market - theoretical
  recommendation: Recommendation;
}

// ============================================================================
// REQUEST TYPES
// ============================================================================

/**
 * Textual fields as submitted by a form, a JSON body or the CLI
 */
export type RawFields = Record<string, string | undefined>;

export interface ParsedRequest {
  inputs: PricingInputs;
  marketPrice: Decimal;
  symbol?: string;
  expiryDate?: string;
}

/**
 * Presentation result, prices rounded to 2 decimals
 */
export interface EvaluationResult {
  theoreticalPrice: number;
  edge: number;
  marketPrice: number;
  recommendation: Recommendation;
  optionType: 'Call' | 'Put';
  symbol?: string;
  expiryDate?: string;
}

export type EvaluationOutcome =
  | { success: true; data: EvaluationResult }
  | { success: false; error: CalculatorError };

// ============================================================================
// API TYPES
// ============================================================================

export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: string;
  code?: string;
  timestamp: Date;
}

// ============================================================================
// CONFIGURATION TYPES
// ============================================================================

export type LogLevel = 'error' | 'warn' | 'info' | 'http' | 'verbose' | 'debug' | 'silly';

export interface ServerConfig {
  host: string;
  port: number;
}

export interface LoggingConfig {
  level: LogLevel;
}

export interface AppConfig {
  server: ServerConfig;
  logging: LoggingConfig;
}
