/**
 * Core domain types for prayer time calculation.
 */

import type { Decimal } from 'decimal.js';

/**
 * The six daily observances, in chronological order.
 */
export type Target = 'fajr' | 'sunrise' | 'zuhr' | 'asr' | 'maghrib' | 'isha';

/**
 * Where a target sits relative to the sun's meridian transit.
 * Decides whether the hour angle is subtracted from or added to the transit time.
 */
export type TargetPhase = 'beforeTransit' | 'transit' | 'afterTransit';

/**
 * Regional calculation convention, selecting default twilight angles.
 */
export type CalculationMethod =
  | 'default'
  | 'mwl'
  | 'algerian'
  | 'diyanet'
  | 'isna'
  | 'ummAlQura'
  | 'gulf'
  | 'karachi'
  | 'france18'
  | 'tunisia'
  | 'egypt'
  | 'egyptBis'
  | 'kemenag'
  | 'muis'
  | 'jakim'
  | 'uoif'
  | 'france15'
  | 'tehran'
  | 'jafari';

/**
 * Afternoon shadow convention.
 * - `shafii`: Asr starts when a shadow equals the object's length plus its noon shadow
 * - `hanafi`: Asr starts when a shadow equals twice the object's length plus its noon shadow
 */
export type AsrConvention = 'shafii' | 'hanafi';

/**
 * Default angles (degrees below the horizon) and Isha rule of a calculation method.
 */
export interface MethodProfile {
  readonly fajrAngle: number;
  /** 0 when Isha is a fixed duration after Maghrib */
  readonly ishaAngle: number;
  /** Fixed Maghrib-to-Isha duration in milliseconds, 0 when Isha uses an angle */
  readonly maghribDurationMs: number;
}

/**
 * Per-target correction table. Missing entries mean no correction.
 */
export type TargetCorrections = Readonly<Partial<Record<Target, number>>>;

/**
 * Calculator settings after the method profile and asr convention are resolved.
 * Built once per calculator and never mutated.
 */
export interface ResolvedSettings {
  readonly latitude: Decimal;
  readonly longitude: Decimal;
  /** Meters above sea level */
  readonly elevation: number;
  readonly fajrAngle: Decimal;
  readonly ishaAngle: Decimal;
  readonly maghribDurationMs: number;
  readonly asrCoefficient: Decimal;
  readonly preciseToSeconds: boolean;
  readonly ignoreElevation: boolean;
  /** Degrees of hour angle added per target */
  readonly angleCorrections: TargetCorrections;
  /** Milliseconds added per target */
  readonly timeCorrectionsMs: TargetCorrections;
}

/**
 * Outcome of calculating one target on one date.
 * `available: false` means the sun never reaches the required altitude that day.
 */
export type TargetTime =
  | { readonly available: true; readonly time: Date }
  | { readonly available: false };
