import type { Decimal } from 'decimal.js';
import { Dec } from '../math/decimal.js';
import {
  DAYS_PER_JULIAN_CENTURY,
  J2000_JULIAN_DAY,
  MS_PER_DAY,
  UNIX_EPOCH_JULIAN_DAY,
} from './constants.js';

/**
 * Converts an instant to its Julian Day, the continuous day count used by
 * the solar position formulas.
 *
 * @param instant - Any instant; its UTC value is used
 * @returns Fractional Julian Day
 *
 * @example
 * toJulianDay(new Date('2000-01-01T12:00:00Z')) // 2451545
 * toJulianDay(new Date('1970-01-01T00:00:00Z')) // 2440587.5
 */
export function toJulianDay(instant: Date): Decimal {
  const ms = instant.getTime();
  if (!Number.isFinite(ms)) {
    throw new Error(`instant must be a valid Date, got ${String(instant)}`);
  }

  return new Dec(ms).div(MS_PER_DAY).plus(UNIX_EPOCH_JULIAN_DAY);
}

/**
 * Julian centuries elapsed since J2000.0.
 */
export function toJulianCentury(julianDay: Decimal): Decimal {
  return julianDay.minus(J2000_JULIAN_DAY).div(DAYS_PER_JULIAN_CENTURY);
}
