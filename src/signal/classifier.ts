/**
 * Edge Signal Classifier
 *
 * Maps the signed gap between market and model price to a trading signal.
 * Negative edge means the market is cheaper than fair value.
 */

import { Decimal, toDecimal } from '../utils/decimal.js';
import { SIGNAL } from '../core/constants.js';
import type { EdgeAssessment, Recommendation } from '../core/types.js';

/**
 * Classify an edge. Total: every finite edge gets exactly one label.
 *
 * Beyond the threshold (strictly) is "Strong", up to and including it is
 * "Consider", exactly zero is "Neutral".
 */
export function classify(
  edge: Decimal | number,
  threshold: Decimal = SIGNAL.STRONG_EDGE_THRESHOLD
): Recommendation {
  const value = toDecimal(edge);

  if (value.lessThan(threshold.negated())) {
    return 'Strong Buy';
  }
  if (value.isNegative() && !value.isZero()) {
    return 'Consider Buy';
  }
  if (value.greaterThan(threshold)) {
    return 'Strong Sell';
  }
  if (value.greaterThan(0)) {
    return 'Consider Sell';
  }
  return 'Neutral';
}

/**
 * Compute edge = market - theoretical and classify it at full precision
 */
export function assessEdge(
  marketPrice: Decimal | number,
  theoreticalPrice: Decimal | number,
  threshold: Decimal = SIGNAL.STRONG_EDGE_THRESHOLD
): EdgeAssessment {
  const edge = toDecimal(marketPrice).minus(toDecimal(theoreticalPrice));
  return {
    edge,
    recommendation: classify(edge, threshold),
  };
}
