/**
 * Prayer time calculator facade.
 *
 * The lifecycle is enforced by types: a `PrayerCalculator` must be initialized
 * before a date can be set, and only a `DatedCalculator` can calculate.
 *
 * @example
 * const times = new PrayerCalculator({ latitude: 21.4225, longitude: 39.8262 })
 *   .init()
 *   .setDate({ year: 2024, month: 6, day: 15, timeZone: 'Asia/Riyadh' })
 *   .calculateAll();
 */

import { applyCorrections, resolveSettings } from '../domain/corrections.js';
import { TARGETS, classifyTarget } from '../domain/targets.js';
import type { ResolvedSettings, Target, TargetTime } from '../domain/types.js';
import {
  calculatorConfigSchema,
  type CalculatorConfig,
  type ParsedCalculatorConfig,
} from '../domain/validation.js';
import { hoursToInstant, type CivilDate } from '../time/civilDate.js';
import { createDaySnapshot, type DaySnapshot } from './daySnapshot.js';
import { refineTargetTime } from './refine.js';

/**
 * A configured calculator whose method and convention defaults are not yet resolved.
 */
export class PrayerCalculator {
  readonly config: ParsedCalculatorConfig;

  /**
   * @throws ZodError if the configuration is malformed
   */
  constructor(config: CalculatorConfig) {
    this.config = calculatorConfigSchema.parse(config);
  }

  /**
   * Resolves the calculation method, asr convention and overrides into numeric settings.
   */
  init(): InitializedCalculator {
    return new InitializedCalculator(resolveSettings(this.config));
  }
}

/**
 * A calculator with resolved settings, waiting for a date.
 */
export class InitializedCalculator {
  constructor(readonly settings: ResolvedSettings) {}

  /**
   * Computes the per-date state (zone offset, transit time, declination) for a date.
   * Each call yields an independent calculator; nothing carries over between dates.
   *
   * @throws ZodError if the date does not exist or its time zone is unknown
   */
  setDate(date: CivilDate): DatedCalculator {
    return new DatedCalculator(this.settings, createDaySnapshot(date, this.settings));
  }
}

/**
 * A calculator bound to one date. Calculations only read its state, so one
 * instance may serve any number of callers.
 */
export class DatedCalculator extends InitializedCalculator {
  constructor(
    settings: ResolvedSettings,
    readonly snapshot: DaySnapshot,
  ) {
    super(settings);
  }

  /**
   * Calculates the time of one target on the active date.
   */
  calculate(target: Target): TargetTime {
    if (target === 'isha' && this.settings.maghribDurationMs !== 0) {
      const maghrib = this.calculate('maghrib');
      if (!maghrib.available) {
        return maghrib;
      }
      return {
        available: true,
        time: new Date(maghrib.time.getTime() + this.settings.maghribDurationMs),
      };
    }

    if (classifyTarget(target) === 'transit') {
      const hours = applyCorrections(this.snapshot.transitTime, target, this.settings);
      return {
        available: true,
        time: hoursToInstant(
          this.snapshot.date,
          hours,
          this.snapshot.offsetHours,
          this.settings.preciseToSeconds,
        ),
      };
    }

    return refineTargetTime(target, this.snapshot, this.settings);
  }

  /**
   * Calculates every target in chronological order, leaving out targets that
   * do not occur on the active date.
   */
  calculateAll(): Map<Target, Date> {
    const result = new Map<Target, Date>();
    for (const target of TARGETS) {
      const targetTime = this.calculate(target);
      if (targetTime.available) {
        result.set(target, targetTime.time);
      }
    }
    return result;
  }
}

/**
 * One-shot helper: configure, initialize, set the date and calculate every target.
 */
export function calculatePrayerTimes(
  config: CalculatorConfig,
  date: CivilDate,
): Map<Target, Date> {
  return new PrayerCalculator(config).init().setDate(date).calculateAll();
}
