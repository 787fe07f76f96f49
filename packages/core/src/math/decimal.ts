/**
 * Fixed-precision decimal arithmetic for the solar position solver.
 *
 * All astronomy runs on a private decimal.js constructor so the refinement
 * loop compares times without floating-point drift, and so the host
 * application's global Decimal configuration is left untouched.
 */

import { Decimal } from 'decimal.js';

/**
 * Significant digits carried through every computation.
 */
export const DECIMAL_PRECISION = 32;

/**
 * Decimal constructor used throughout the package.
 */
export const Dec = Decimal.clone({
  precision: DECIMAL_PRECISION,
  rounding: Decimal.ROUND_HALF_UP,
});

export type DecimalValue = Decimal.Value;

export const PI = Dec.acos(-1);

const RADIANS_PER_DEGREE = PI.div(180);

export function degreesToRadians(degrees: DecimalValue): Decimal {
  return new Dec(degrees).times(RADIANS_PER_DEGREE);
}

export function radiansToDegrees(radians: DecimalValue): Decimal {
  return new Dec(radians).div(RADIANS_PER_DEGREE);
}

export function sinDeg(degrees: DecimalValue): Decimal {
  return degreesToRadians(degrees).sin();
}

export function cosDeg(degrees: DecimalValue): Decimal {
  return degreesToRadians(degrees).cos();
}

export function tanDeg(degrees: DecimalValue): Decimal {
  return degreesToRadians(degrees).tan();
}

/**
 * Inverse sine in degrees. NaN outside [-1, 1].
 */
export function asinDeg(value: DecimalValue): Decimal {
  return radiansToDegrees(new Dec(value).asin());
}

/**
 * Inverse cosine in degrees, in [0, 180]. NaN outside [-1, 1].
 */
export function acosDeg(value: DecimalValue): Decimal {
  return radiansToDegrees(new Dec(value).acos());
}

export function atanDeg(value: DecimalValue): Decimal {
  return radiansToDegrees(new Dec(value).atan());
}

/**
 * Normalizes an angle to [0, 360).
 *
 * @example
 * normalizeDegrees(-30) // 330
 * normalizeDegrees(725) // 5
 */
export function normalizeDegrees(degrees: DecimalValue): Decimal {
  const wrapped = new Dec(degrees).mod(360);
  if (wrapped.isZero()) {
    return new Dec(0);
  }
  return wrapped.isNegative() ? wrapped.plus(360) : wrapped;
}
