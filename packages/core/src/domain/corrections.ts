/**
 * Resolution of method/convention defaults and per-target corrections.
 */

import type { Decimal } from 'decimal.js';
import { Dec } from '../math/decimal.js';
import { DEGREES_PER_HOUR, MS_PER_HOUR } from '../time/constants.js';
import { getAsrCoefficient, getMethodProfile } from './methods.js';
import type { ResolvedSettings, Target } from './types.js';
import type { ParsedCalculatorConfig } from './validation.js';

/**
 * Picks the explicit value unless it is zero, in which case the default wins.
 */
function overrideNonZero(explicit: number, fallback: number): number {
  return explicit !== 0 ? explicit : fallback;
}

/**
 * Resolves a parsed configuration into calculator settings.
 *
 * Twilight angles and the Maghrib-to-Isha duration come from the calculation
 * method, overridden field by field by any non-zero explicit value. The asr
 * coefficient is 2 for the hanafi convention and 1 otherwise.
 *
 * @example
 * resolveSettings(calculatorConfigSchema.parse({
 *   latitude: 21.4225,
 *   longitude: 39.8262,
 *   calculationMethod: 'ummAlQura',
 *   ishaAngle: 17,
 * }))
 * // fajrAngle 18.5, ishaAngle 17, maghribDurationMs 5400000
 */
export function resolveSettings(config: ParsedCalculatorConfig): ResolvedSettings {
  const profile = getMethodProfile(config.calculationMethod);

  return Object.freeze({
    latitude: new Dec(config.latitude),
    longitude: new Dec(config.longitude),
    elevation: config.elevation,
    fajrAngle: new Dec(overrideNonZero(config.fajrAngle, profile.fajrAngle)),
    ishaAngle: new Dec(overrideNonZero(config.ishaAngle, profile.ishaAngle)),
    maghribDurationMs: overrideNonZero(config.maghribDurationMs, profile.maghribDurationMs),
    asrCoefficient: new Dec(getAsrCoefficient(config.asrConvention)),
    preciseToSeconds: config.preciseToSeconds,
    ignoreElevation: config.ignoreElevation,
    angleCorrections: Object.freeze({ ...config.angleCorrections }),
    timeCorrectionsMs: Object.freeze({ ...config.timeCorrectionsMs }),
  });
}

/**
 * Adds a target's angle correction (as hour angle, 15° per hour) and time
 * correction to a solved local clock hour.
 */
export function applyCorrections(
  hours: Decimal,
  target: Target,
  settings: ResolvedSettings,
): Decimal {
  let corrected = hours;

  const angleCorrection = settings.angleCorrections[target];
  if (angleCorrection !== undefined) {
    corrected = corrected.plus(new Dec(angleCorrection).div(DEGREES_PER_HOUR));
  }

  const timeCorrectionMs = settings.timeCorrectionsMs[target];
  if (timeCorrectionMs !== undefined) {
    corrected = corrected.plus(new Dec(timeCorrectionMs).div(MS_PER_HOUR));
  }

  return corrected;
}
