/**
 * Request Evaluation
 *
 * Turns raw textual fields into a priced, classified result. This is the
 * seam the HTTP form, the JSON API and the CLI all call.
 *
 * Form conventions (percent, days) are converted here and nowhere else:
 * the pricer only ever sees fractional rates and years.
 */

import { Decimal, parseDecimal, isPositive, toDisplayNumber } from '../utils/decimal.js';
import { PRICING, FIELDS, REQUIRED_FIELDS } from '../core/constants.js';
import {
  MissingFieldError,
  ParseError,
  InvalidInputError,
  InvalidOptionTypeError,
  isValidationError,
  wrapError,
} from '../core/errors.js';
import { priceOption } from '../pricing/black-scholes.js';
import { assessEdge } from '../signal/classifier.js';
import { logError, type DiagnosticsLogger } from '../utils/logger.js';
import type {
  EvaluationOutcome,
  EvaluationResult,
  OptionVariant,
  ParsedRequest,
  RawFields,
} from '../core/types.js';

export interface EvaluateDeps {
  logger: DiagnosticsLogger;
}

// ============================================================================
// PARSING
// ============================================================================

function parseNumericField(fields: Record<string, string>, field: string): Decimal {
  const text = fields[field] ?? '';
  const value = parseDecimal(text);
  if (value === undefined) {
    throw new ParseError(field, text);
  }
  return value;
}

function parseVariant(text: string): OptionVariant {
  switch (text.trim().toLowerCase()) {
    case 'call':
      return 'CALL';
    case 'put':
      return 'PUT';
    default:
      throw new InvalidOptionTypeError(text);
  }
}

function optionalText(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Validate raw fields and build canonical pricing inputs.
 *
 * Order: presence, numeric parse, unit normalization, positivity,
 * option type. The first failing step throws.
 */
export function parseRequest(raw: RawFields): ParsedRequest {
  const fields: Record<string, string> = {};
  const missing: string[] = [];

  for (const field of REQUIRED_FIELDS) {
    const value = raw[field];
    if (typeof value === 'string') {
      fields[field] = value;
    } else {
      missing.push(field);
    }
  }

  if (missing.length > 0) {
    throw new MissingFieldError(missing);
  }

  const spot = parseNumericField(fields, FIELDS.SPOT_PRICE);
  const strike = parseNumericField(fields, FIELDS.STRIKE_PRICE);
  const volatilityPct = parseNumericField(fields, FIELDS.VOLATILITY);
  const ratePct = parseNumericField(fields, FIELDS.RISK_FREE_RATE);
  const days = parseNumericField(fields, FIELDS.TIME_TO_EXPIRY);
  const marketPrice = parseNumericField(fields, FIELDS.MARKET_PRICE);

  const volatility = volatilityPct.dividedBy(PRICING.PERCENT_DIVISOR);
  const riskFreeRate = ratePct.dividedBy(PRICING.PERCENT_DIVISOR);
  const timeToExpiry = days.dividedBy(PRICING.DAYS_IN_YEAR);

  const nonPositive = Object.entries({
    [FIELDS.SPOT_PRICE]: spot,
    [FIELDS.STRIKE_PRICE]: strike,
    [FIELDS.VOLATILITY]: volatility,
    [FIELDS.TIME_TO_EXPIRY]: timeToExpiry,
  })
    .filter(([, value]) => !isPositive(value))
    .map(([name]) => name);

  if (nonPositive.length > 0) {
    throw new InvalidInputError('Prices, volatility, and time must be positive', {
      fields: nonPositive,
    });
  }

  const variant = parseVariant(fields[FIELDS.OPTION_TYPE] ?? '');

  return {
    inputs: { spot, strike, volatility, riskFreeRate, timeToExpiry, variant },
    marketPrice,
    symbol: optionalText(raw[FIELDS.SYMBOL])?.toUpperCase(),
    expiryDate: optionalText(raw[FIELDS.EXPIRY_DATE]),
  };
}

// ============================================================================
// EVALUATION
// ============================================================================

function calculate(raw: RawFields, logger: DiagnosticsLogger): EvaluationResult {
  const request = parseRequest(raw);
  const { theoreticalPrice } = priceOption(request.inputs, { logger });
  const { edge, recommendation } = assessEdge(request.marketPrice, theoreticalPrice);

  const presented = {
    theoreticalPrice: toDisplayNumber(theoreticalPrice, PRICING.DISPLAY_DECIMALS),
    edge: toDisplayNumber(edge, PRICING.DISPLAY_DECIMALS),
    marketPrice: request.marketPrice.toNumber(),
  };

  // Decimal carries magnitudes a JS number cannot
  const overflowed = Object.entries(presented)
    .filter(([, value]) => !Number.isFinite(value))
    .map(([name]) => name);

  if (overflowed.length > 0) {
    throw new InvalidInputError('Inputs are too large to evaluate', { fields: overflowed });
  }

  const result: EvaluationResult = {
    ...presented,
    recommendation,
    optionType: request.inputs.variant === 'CALL' ? 'Call' : 'Put',
  };
  if (request.symbol !== undefined) result.symbol = request.symbol;
  if (request.expiryDate !== undefined) result.expiryDate = request.expiryDate;

  logger.debug('Option evaluated', {
    variant: request.inputs.variant,
    theoreticalPrice: theoreticalPrice.toString(),
    edge: edge.toString(),
    recommendation,
  });

  return result;
}

/**
 * Evaluate a request. Never throws: every failure comes back as an error
 * whose message is fit to show the user.
 */
export function evaluate(raw: RawFields, deps: EvaluateDeps): EvaluationOutcome {
  const { logger } = deps;

  try {
    return { success: true, data: calculate(raw, logger) };
  } catch (error) {
    if (isValidationError(error)) {
      logger.warn('Evaluation rejected', { code: error.code, context: error.context });
      return { success: false, error };
    }

    const wrapped = wrapError(error);
    logError(logger, wrapped);
    return { success: false, error: wrapped };
  }
}
