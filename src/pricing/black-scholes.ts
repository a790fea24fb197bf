/**
 * Black-Scholes Options Pricing
 *
 * Closed-form model for European calls and puts, no dividends.
 * Inputs are canonical: fractional rates and time in years.
 */

import { Decimal, toDecimal, isPositive, ONE, TWO } from '../utils/decimal.js';
import { NORMAL_CDF } from '../core/constants.js';
import { InvalidInputError, isCalculatorError } from '../core/errors.js';
import type { DiagnosticsLogger } from '../utils/logger.js';
import type { OptionVariant, PricingInputs, PricingResult } from '../core/types.js';

export interface PriceOptions {
  /** Receives one warning when pricing fails */
  logger?: DiagnosticsLogger;
}

// ============================================================================
// STANDARD NORMAL DISTRIBUTION
// ============================================================================

const SQRT_TWO = TWO.sqrt();

/**
 * Error function for x >= 0.
 * Abramowitz and Stegun 7.1.26 (absolute error < 1.5e-7).
 */
function erf(x: Decimal): Decimal {
  const { A1, A2, A3, A4, A5, P } = NORMAL_CDF;

  const t = ONE.dividedBy(ONE.plus(P.times(x)));
  const t2 = t.times(t);
  const t3 = t2.times(t);
  const t4 = t3.times(t);
  const t5 = t4.times(t);

  const polynomial = A1.times(t)
    .plus(A2.times(t2))
    .plus(A3.times(t3))
    .plus(A4.times(t4))
    .plus(A5.times(t5));

  return ONE.minus(polynomial.times(x.negated().times(x).exp()));
}

/**
 * Standard normal cumulative distribution function (CDF), error < 7.5e-8.
 * Computed on |x| and mirrored, so normCDF(x) + normCDF(-x) is 1.
 */
export function normCDF(x: Decimal): Decimal {
  const upper = ONE.plus(erf(x.abs().dividedBy(SQRT_TWO))).dividedBy(TWO);
  return x.isNegative() ? ONE.minus(upper) : upper;
}

// ============================================================================
// VALIDATION
// ============================================================================

/**
 * Reject anything the closed form is undefined for, before any arithmetic
 */
export function validatePricingInputs(inputs: PricingInputs): void {
  const { spot, strike, volatility, riskFreeRate, timeToExpiry } = inputs;

  const nonPositive = Object.entries({ spot, strike, volatility, timeToExpiry })
    .filter(([, value]) => !isPositive(value))
    .map(([name]) => name);

  if (nonPositive.length > 0) {
    throw new InvalidInputError('Prices, volatility, and time must be positive', {
      fields: nonPositive,
    });
  }

  if (!riskFreeRate.isFinite()) {
    throw new InvalidInputError('Risk-free rate must be a finite number', {
      fields: ['riskFreeRate'],
    });
  }

  // Both factors are positive here, but a product can still underflow
  if (volatility.times(timeToExpiry.sqrt()).isZero()) {
    throw new InvalidInputError('Volatility and time to expiry are too small to price', {
      volatility: volatility.toString(),
      timeToExpiry: timeToExpiry.toString(),
    });
  }
}

// ============================================================================
// BLACK-SCHOLES FORMULAS
// ============================================================================

/**
 * Calculate d1 and d2 parameters
 */
export function calculateD1D2(params: PricingInputs): { d1: Decimal; d2: Decimal } {
  const { spot, strike, timeToExpiry, riskFreeRate, volatility } = params;

  const volSqrtT = volatility.times(timeToExpiry.sqrt());

  // d1 = (ln(S/K) + (r + σ²/2) * T) / (σ * √T)
  const logSK = spot.dividedBy(strike).ln();
  const rPlusHalfVol2 = riskFreeRate.plus(volatility.times(volatility).dividedBy(TWO));
  const numerator = logSK.plus(rPlusHalfVol2.times(timeToExpiry));

  const d1 = numerator.dividedBy(volSqrtT);
  const d2 = d1.minus(volSqrtT);

  return { d1, d2 };
}

function discountFactor(params: PricingInputs): Decimal {
  return params.riskFreeRate.negated().times(params.timeToExpiry).exp();
}

/**
 * Calculate call option price using Black-Scholes
 */
export function calculateCallPrice(params: PricingInputs): Decimal {
  const { spot, strike } = params;
  const { d1, d2 } = calculateD1D2(params);

  // C = S * N(d1) - K * e^(-rT) * N(d2)
  return spot.times(normCDF(d1)).minus(strike.times(discountFactor(params)).times(normCDF(d2)));
}

/**
 * Calculate put option price using Black-Scholes
 */
export function calculatePutPrice(params: PricingInputs): Decimal {
  const { spot, strike } = params;
  const { d1, d2 } = calculateD1D2(params);

  // P = K * e^(-rT) * N(-d2) - S * N(-d1)
  return strike
    .times(discountFactor(params))
    .times(normCDF(d2.negated()))
    .minus(spot.times(normCDF(d1.negated())));
}

/**
 * Validate and price a call or put. Never rounds.
 */
export function priceOption(inputs: PricingInputs, options: PriceOptions = {}): PricingResult {
  try {
    validatePricingInputs(inputs);

    const theoreticalPrice =
      inputs.variant === 'CALL' ? calculateCallPrice(inputs) : calculatePutPrice(inputs);

    if (!theoreticalPrice.isFinite()) {
      throw new InvalidInputError('Invalid input parameters for Black-Scholes calculation', {
        result: theoreticalPrice.toString(),
      });
    }

    return { theoreticalPrice };
  } catch (error) {
    const failure = isCalculatorError(error)
      ? error
      : new InvalidInputError('Invalid input parameters for Black-Scholes calculation', {
          reason: error instanceof Error ? error.message : String(error),
        });

    options.logger?.warn('Black-Scholes calculation failed', {
      code: failure.code,
      variant: inputs.variant,
      context: failure.context,
    });
    throw failure;
  }
}

/**
 * Positional entry point: price(variant, spot, strike, volatility, rate, time)
 */
export function price(
  variant: OptionVariant,
  spot: Decimal.Value,
  strike: Decimal.Value,
  volatility: Decimal.Value,
  rate: Decimal.Value,
  time: Decimal.Value,
  options: PriceOptions = {}
): Decimal {
  return priceOption(
    {
      variant,
      spot: toPricingDecimal('spot', spot),
      strike: toPricingDecimal('strike', strike),
      volatility: toPricingDecimal('volatility', volatility),
      riskFreeRate: toPricingDecimal('riskFreeRate', rate),
      timeToExpiry: toPricingDecimal('timeToExpiry', time),
    },
    options
  ).theoreticalPrice;
}

function toPricingDecimal(name: string, value: Decimal.Value): Decimal {
  try {
    return toDecimal(value);
  } catch (error) {
    throw new InvalidInputError(`Invalid ${name}: ${String(value)}`, {
      fields: [name],
      reason: error instanceof Error ? error.message : String(error),
    });
  }
}
