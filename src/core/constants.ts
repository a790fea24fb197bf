/**
 * Constants for the Option Edge Calculator
 */

import { Decimal } from 'decimal.js';

// ============================================================================
// OPTIONS PRICING CONSTANTS
// ============================================================================

export const PRICING = {
  // Form inputs arrive as whole percent and whole days
  PERCENT_DIVISOR: new Decimal(100),
  DAYS_IN_YEAR: new Decimal(365),

  // Presentation rounding
  DISPLAY_DECIMALS: 2,
} as const;

/**
 * Abramowitz and Stegun 7.1.26 coefficients (erf)
 */
export const NORMAL_CDF = {
  A1: new Decimal('0.254829592'),
  A2: new Decimal('-0.284496736'),
  A3: new Decimal('1.421413741'),
  A4: new Decimal('-1.453152027'),
  A5: new Decimal('1.061405429'),
  P: new Decimal('0.3275911'),
} as const;

// ============================================================================
// SIGNAL CONSTANTS
// ============================================================================

export const SIGNAL = {
  // 10 cents either side of fair value
  STRONG_EDGE_THRESHOLD: new Decimal('0.10'),
} as const;

// ============================================================================
// REQUEST FIELDS
// ============================================================================

export const FIELDS = {
  SPOT_PRICE: 'spot_price',
  STRIKE_PRICE: 'strike_price',
  VOLATILITY: 'volatility',
  RISK_FREE_RATE: 'risk_free_rate',
  TIME_TO_EXPIRY: 'time_to_expiry',
  MARKET_PRICE: 'market_price',
  OPTION_TYPE: 'option_type',
  SYMBOL: 'symbol',
  EXPIRY_DATE: 'expiry_date',
} as const;

export const REQUIRED_FIELDS = [
  FIELDS.SPOT_PRICE,
  FIELDS.STRIKE_PRICE,
  FIELDS.VOLATILITY,
  FIELDS.RISK_FREE_RATE,
  FIELDS.TIME_TO_EXPIRY,
  FIELDS.MARKET_PRICE,
  FIELDS.OPTION_TYPE,
] as const;

// ============================================================================
// SERVER CONSTANTS
// ============================================================================

export const SERVER = {
  DEFAULT_HOST: '0.0.0.0',
  DEFAULT_PORT: 8080,
} as const;

// ============================================================================
// LOGGING CONSTANTS
// ============================================================================

export const LOGGING = {
  DEFAULT_LEVEL: 'info',
  FILE_MAX_SIZE: 10 * 1024 * 1024,
  FILE_MAX_FILES: 10,
  LOG_DIR: './logs/',
  SERVICE_NAME: 'option-edge',
} as const;
