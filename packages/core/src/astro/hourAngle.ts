import type { Decimal } from 'decimal.js';
import { acosDeg, cosDeg, sinDeg } from '../math/decimal.js';

/**
 * Hour angle at which the sun reaches an altitude, or `unavailable` when it never does that day.
 */
export type HourAngleResult =
  | { readonly kind: 'ok'; readonly degrees: Decimal }
  | { readonly kind: 'unavailable' };

const UNAVAILABLE: HourAngleResult = Object.freeze({ kind: 'unavailable' });

/**
 * Solves cos(H) = (sin(altitude) − sin(latitude)·sin(declination)) / (cos(latitude)·cos(declination))
 * for the hour angle H in degrees, H ∈ [0, 180].
 *
 * Returns `unavailable` when the right-hand side is outside [−1, 1] (the sun stays above
 * or below the altitude all day) or undefined (observer at a pole).
 *
 * @example
 * solveHourAngle(new Dec(0), new Dec(0), new Dec(0)) // { kind: 'ok', degrees: 90 }
 * solveHourAngle(new Dec(-18), new Dec(23.44), new Dec(70)) // { kind: 'unavailable' }
 */
export function solveHourAngle(
  altitude: Decimal,
  declination: Decimal,
  latitude: Decimal,
): HourAngleResult {
  const denominator = cosDeg(latitude).times(cosDeg(declination));
  if (denominator.isZero()) {
    return UNAVAILABLE;
  }

  const cosHourAngle = sinDeg(altitude)
    .minus(sinDeg(latitude).times(sinDeg(declination)))
    .div(denominator);

  if (!cosHourAngle.isFinite() || cosHourAngle.abs().gt(1)) {
    return UNAVAILABLE;
  }

  return { kind: 'ok', degrees: acosDeg(cosHourAngle) };
}
