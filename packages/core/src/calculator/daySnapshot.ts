import type { Decimal } from 'decimal.js';
import { Dec } from '../math/decimal.js';
import { getSunDeclination, getTransitTime } from '../astro/sunPosition.js';
import { civilDateSchema, localNoon, type CivilDate } from '../time/civilDate.js';
import { toJulianDay } from '../time/julianDay.js';
import type { ResolvedSettings } from '../domain/types.js';

/**
 * Everything derived from the active date. Built wholesale by `createDaySnapshot`
 * and shared read-only by every calculation on that date.
 */
export interface DaySnapshot {
  readonly date: CivilDate;
  /** 12:00 local time on the date */
  readonly noon: Date;
  /** UTC offset at local noon, hours */
  readonly offsetHours: Decimal;
  /** Julian Day of local noon */
  readonly julianDay: Decimal;
  /** Local clock hour of the meridian transit */
  readonly transitTime: Decimal;
  /** Sun declination at local noon, degrees */
  readonly sunDeclination: Decimal;
}

/**
 * Builds the per-date state for a civil date.
 *
 * @throws ZodError if the date does not exist or the time zone is unknown
 */
export function createDaySnapshot(date: CivilDate, settings: ResolvedSettings): DaySnapshot {
  const civilDate = civilDateSchema.parse(date);
  const noon = localNoon(civilDate);
  const offsetHours = new Dec(noon.offsetHours);
  const julianDay = toJulianDay(noon.instant);

  return Object.freeze({
    date: Object.freeze({ ...civilDate }),
    noon: noon.instant,
    offsetHours,
    julianDay,
    transitTime: getTransitTime(julianDay, settings.longitude, offsetHours),
    sunDeclination: getSunDeclination(julianDay),
  });
}
