import type { Decimal } from 'decimal.js';
import { z } from 'zod';
import { MS_PER_HOUR } from './constants.js';

/**
 * A calendar date anchored to a civil time zone.
 */
export interface CivilDate {
  /** Full year, e.g. 2024 */
  readonly year: number;
  /** Month of year, 1 = January */
  readonly month: number;
  /** Day of month, 1-31 */
  readonly day: number;
  /** IANA time zone (e.g. "Asia/Riyadh") or "UTC" */
  readonly timeZone: string;
}

/**
 * Like `Date.UTC`, but takes years 0-99 literally instead of as 1900-1999.
 */
function utcMs(
  year: number,
  monthIndex: number,
  day: number,
  hours = 0,
  minutes = 0,
  seconds = 0,
): number {
  const date = new Date(0);
  date.setUTCFullYear(year, monthIndex, day);
  date.setUTCHours(hours, minutes, seconds, 0);
  return date.getTime();
}

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch (error) {
    if (error instanceof RangeError) {
      return false;
    }
    throw error;
  }
}

/**
 * Schema for CivilDate. Rejects impossible days (e.g. February 30) and
 * time zones the platform does not know.
 */
export const civilDateSchema = z
  .object({
    year: z.number().int().min(1),
    month: z.number().int().min(1).max(12),
    day: z.number().int().min(1).max(31),
    timeZone: z.string().min(1).refine(isValidTimeZone, {
      message: 'timeZone must be a valid IANA time zone',
    }),
  })
  .refine(
    (date) => {
      const probe = new Date(utcMs(date.year, date.month - 1, date.day));
      return probe.getUTCMonth() === date.month - 1 && probe.getUTCDate() === date.day;
    },
    {
      message: 'day does not exist in this month',
      path: ['day'],
    },
  );

/**
 * Returns the UTC offset of a time zone at the given instant, in hours
 * (east of Greenwich positive).
 *
 * @example
 * utcOffsetHours(new Date('2024-06-15T12:00:00Z'), 'America/New_York') // -4
 * utcOffsetHours(new Date('2024-01-15T12:00:00Z'), 'Asia/Kolkata') // 5.5
 */
export function utcOffsetHours(instant: Date, timeZone: string): number {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: 'numeric',
    day: 'numeric',
    hour: 'numeric',
    minute: 'numeric',
    second: 'numeric',
    hourCycle: 'h23',
  });

  const parts = formatter.formatToParts(instant);
  const part = (type: Intl.DateTimeFormatPartTypes): number => {
    const value = parts.find((p) => p.type === type)?.value;
    if (value === undefined) {
      throw new Error(`Missing ${type} when formatting ${instant.toISOString()} in ${timeZone}`);
    }
    return parseInt(value, 10);
  };

  const wallClockMs = utcMs(
    part('year'),
    part('month') - 1,
    part('day'),
    part('hour'),
    part('minute'),
    part('second'),
  );

  // Formatting drops milliseconds, so compare against the whole second
  const instantMs = Math.floor(instant.getTime() / 1000) * 1000;
  return (wallClockMs - instantMs) / MS_PER_HOUR;
}

/**
 * Local noon of a civil date, together with the zone offset in effect then.
 */
export interface LocalNoon {
  readonly instant: Date;
  readonly offsetHours: number;
}

/**
 * Resolves 12:00 local time on a civil date.
 *
 * The offset is looked up twice so a DST change during the night before is
 * picked up correctly.
 */
export function localNoon(date: CivilDate): LocalNoon {
  const noonAsUtcMs = utcMs(date.year, date.month - 1, date.day, 12);

  let offsetHours = utcOffsetHours(new Date(noonAsUtcMs), date.timeZone);
  offsetHours = utcOffsetHours(
    new Date(noonAsUtcMs - offsetHours * MS_PER_HOUR),
    date.timeZone,
  );

  return {
    instant: new Date(noonAsUtcMs - offsetHours * MS_PER_HOUR),
    offsetHours,
  };
}

/**
 * Converts a fractional local clock hour of a civil date into an instant.
 * Hours outside [0, 24) land on the previous or next day.
 *
 * @param date - The civil date the hours are counted from (local midnight)
 * @param hours - Local clock hours, e.g. 12.5 for 12:30
 * @param offsetHours - Zone offset to apply, in hours
 * @param preciseToSeconds - Round to the nearest second when true, else to the nearest minute
 */
export function hoursToInstant(
  date: CivilDate,
  hours: Decimal,
  offsetHours: Decimal,
  preciseToSeconds: boolean,
): Date {
  const midnightAsUtcMs = utcMs(date.year, date.month - 1, date.day);
  const utcSeconds = hours.minus(offsetHours).times(3600);
  const roundedSeconds = preciseToSeconds
    ? utcSeconds.round()
    : utcSeconds.div(60).round().times(60);

  return new Date(midnightAsUtcMs + roundedSeconds.toNumber() * 1000);
}
