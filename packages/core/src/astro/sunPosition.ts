/**
 * Solar position: declination, equation of time, meridian transit and the
 * sun altitude that defines each target.
 *
 * Low-precision solar coordinates (Meeus, Astronomical Algorithms ch. 25 and 28),
 * good to about 0.01° in declination and a few seconds in the equation of time.
 */

import type { Decimal } from 'decimal.js';
import {
  Dec,
  PI,
  asinDeg,
  atanDeg,
  cosDeg,
  normalizeDegrees,
  sinDeg,
  tanDeg,
} from '../math/decimal.js';
import { toJulianCentury } from '../time/julianDay.js';
import { DEGREES_PER_HOUR } from '../time/constants.js';
import type { ResolvedSettings, Target } from '../domain/types.js';

/**
 * Altitude of the sun's centre at geometric sunrise/sunset: refraction plus semi-diameter.
 */
export const HORIZON_ALTITUDE = -0.8333;

/**
 * Dip of the horizon per square root meter of elevation, in degrees.
 */
export const ELEVATION_DIP_COEFFICIENT = 0.0347;

interface SolarCoordinates {
  /** Geometric mean longitude, degrees */
  meanLongitude: Decimal;
  /** Mean anomaly, degrees */
  meanAnomaly: Decimal;
  /** Eccentricity of Earth's orbit */
  eccentricity: Decimal;
  /** Apparent longitude, degrees */
  apparentLongitude: Decimal;
  /** Obliquity of the ecliptic corrected for nutation, degrees */
  obliquity: Decimal;
}

function getSolarCoordinates(julianDay: Decimal): SolarCoordinates {
  const t = toJulianCentury(julianDay);
  const t2 = t.pow(2);

  const meanLongitude = normalizeDegrees(
    new Dec('280.46646').plus(t.times('36000.76983')).plus(t2.times('0.0003032')),
  );
  const meanAnomaly = normalizeDegrees(
    new Dec('357.52911').plus(t.times('35999.05029')).minus(t2.times('0.0001537')),
  );
  const eccentricity = new Dec('0.016708634')
    .minus(t.times('0.000042037'))
    .minus(t2.times('0.0000001267'));

  const equationOfCenter = sinDeg(meanAnomaly)
    .times(new Dec('1.914602').minus(t.times('0.004817')).minus(t2.times('0.000014')))
    .plus(sinDeg(meanAnomaly.times(2)).times(new Dec('0.019993').minus(t.times('0.000101'))))
    .plus(sinDeg(meanAnomaly.times(3)).times('0.000289'));

  const omega = new Dec('125.04').minus(t.times('1934.136'));
  const apparentLongitude = meanLongitude
    .plus(equationOfCenter)
    .minus('0.00569')
    .minus(sinDeg(omega).times('0.00478'));

  const meanObliquity = new Dec('23.4392911')
    .minus(t.times('0.0130042'))
    .minus(t2.times('0.00000016'))
    .plus(t2.times(t).times('0.000000504'));
  const obliquity = meanObliquity.plus(cosDeg(omega).times('0.00256'));

  return { meanLongitude, meanAnomaly, eccentricity, apparentLongitude, obliquity };
}

/**
 * Sun's apparent declination in degrees.
 *
 * @example
 * getSunDeclination(toJulianDay(new Date('2024-06-20T21:00:00Z'))) // ≈ 23.44
 */
export function getSunDeclination(julianDay: Decimal): Decimal {
  const { apparentLongitude, obliquity } = getSolarCoordinates(julianDay);
  return asinDeg(sinDeg(obliquity).times(sinDeg(apparentLongitude)));
}

/**
 * Equation of time in minutes (apparent solar time minus mean solar time).
 */
export function getEquationOfTime(julianDay: Decimal): Decimal {
  const { meanLongitude, meanAnomaly, eccentricity, obliquity } =
    getSolarCoordinates(julianDay);

  const y = tanDeg(obliquity.div(2)).pow(2);
  const l0 = meanLongitude;
  const m = meanAnomaly;
  const e = eccentricity;

  const radians = y
    .times(sinDeg(l0.times(2)))
    .minus(e.times(2).times(sinDeg(m)))
    .plus(e.times(4).times(y).times(sinDeg(m)).times(cosDeg(l0.times(2))))
    .minus(y.pow(2).times('0.5').times(sinDeg(l0.times(4))))
    .minus(e.pow(2).times('1.25').times(sinDeg(m.times(2))));

  // radians of hour angle -> minutes of time
  return radians.times(180).div(PI).times(4);
}

/**
 * Local clock time of the sun's meridian transit, in fractional hours.
 *
 * @param julianDay - Instant to evaluate the equation of time at
 * @param longitude - Degrees, east positive
 * @param offsetHours - UTC offset of the local clock
 */
export function getTransitTime(
  julianDay: Decimal,
  longitude: Decimal,
  offsetHours: Decimal,
): Decimal {
  return new Dec(12)
    .plus(offsetHours)
    .minus(longitude.div(DEGREES_PER_HOUR))
    .minus(getEquationOfTime(julianDay).div(60));
}

/**
 * Altitude of the sun's horizon crossing at sunrise/sunset, lowered by the dip of
 * the horizon for an elevated observer unless elevation is ignored.
 */
export function getHorizonAltitude(settings: ResolvedSettings): Decimal {
  const horizon = new Dec(HORIZON_ALTITUDE);
  if (settings.ignoreElevation || settings.elevation <= 0) {
    return horizon;
  }
  return horizon.minus(new Dec(settings.elevation).sqrt().times(ELEVATION_DIP_COEFFICIENT));
}

/**
 * Altitude at which the shadow of an object is `coefficient` times its length
 * plus its noon shadow: arccot(coefficient + tan|latitude − declination|).
 *
 * When the sun stays below the horizon all day (|latitude − declination| > 90°)
 * the tangent turns negative and the result is a below-horizon altitude, so asr
 * can still resolve to a time during polar night.
 */
export function getAsrAltitude(
  declination: Decimal,
  latitude: Decimal,
  coefficient: Decimal,
): Decimal {
  const noonShadow = tanDeg(latitude.minus(declination).abs());
  return atanDeg(new Dec(1).div(coefficient.plus(noonShadow)));
}

/**
 * Sun altitude in degrees that marks a target.
 *
 * @throws Error for zuhr, which is defined by the transit and has no altitude
 */
export function getSunAltitude(
  target: Target,
  declination: Decimal,
  settings: ResolvedSettings,
): Decimal {
  switch (target) {
    case 'fajr':
      return settings.fajrAngle.neg();
    case 'isha':
      return settings.ishaAngle.neg();
    case 'sunrise':
    case 'maghrib':
      return getHorizonAltitude(settings);
    case 'asr':
      return getAsrAltitude(declination, settings.latitude, settings.asrCoefficient);
    case 'zuhr':
      throw new Error('zuhr is defined by the meridian transit and has no target altitude');
  }
}
