/**
 * Options Pricing Module Exports
 */

export {
  normCDF,
  validatePricingInputs,
  calculateD1D2,
  calculateCallPrice,
  calculatePutPrice,
  priceOption,
  price,
} from './black-scholes.js';
export type { PriceOptions } from './black-scholes.js';
