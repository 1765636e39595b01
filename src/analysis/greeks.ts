/**
 * Black-Scholes-Merton price and Greeks for European options.
 * Theta is per calendar day, vega per 1 vol point.
 */

import type { OptionType } from '@/types/market';

export interface BlackScholesInputs {
  type: OptionType;
  spot: number;
  strike: number;
  /** Years to expiry. */
  years: number;
  rate: number;
  sigma: number;
}

export interface BlackScholesResult {
  price: number;
  delta: number;
  gamma: number;
  theta: number;
  vega: number;
}

const INV_SQRT_2PI = 1 / Math.sqrt(2 * Math.PI);

export function normPdf(x: number): number {
  return INV_SQRT_2PI * Math.exp(-0.5 * x * x);
}

function erf(x: number): number {
  // Abramowitz and Stegun 7.1.26
  const sign = Math.sign(x) || 1;
  const ax = Math.abs(x);
  const t = 1 / (1 + 0.3275911 * ax);
  const coefficients = [1.061405429, -1.453152027, 1.421413741, -0.284496736, 0.254829592];
  const poly = coefficients.reduce((acc, coeff) => acc * t + coeff, 0);
  return sign * (1 - poly * t * Math.exp(-ax * ax));
}

export function normCdf(x: number): number {
  return 0.5 * (1 + erf(x / Math.SQRT2));
}

/** null when any input makes the model undefined (expired, zero vol, non-positive prices). */
export function blackScholes(inputs: BlackScholesInputs): BlackScholesResult | null {
  const { type, spot, strike, years, rate, sigma } = inputs;
  if (!(years > 0) || !(sigma > 0) || !(spot > 0) || !(strike > 0)) {
    return null;
  }

  const sqrtT = Math.sqrt(years);
  const d1 = (Math.log(spot / strike) + (rate + 0.5 * sigma * sigma) * years) / (sigma * sqrtT);
  const d2 = d1 - sigma * sqrtT;
  const discount = Math.exp(-rate * years);
  const pdfD1 = normPdf(d1);

  const gamma = pdfD1 / (spot * sigma * sqrtT);
  const vega = (spot * sqrtT * pdfD1) / 100;
  const decay = -(spot * pdfD1 * sigma) / (2 * sqrtT);

  if (type === 'CALL') {
    return {
      price: spot * normCdf(d1) - strike * discount * normCdf(d2),
      delta: normCdf(d1),
      gamma,
      theta: (decay - rate * strike * discount * normCdf(d2)) / 365,
      vega,
    };
  }

  return {
    price: strike * discount * normCdf(-d2) - spot * normCdf(-d1),
    delta: normCdf(d1) - 1,
    gamma,
    theta: (decay + rate * strike * discount * normCdf(-d2)) / 365,
    vega,
  };
}
