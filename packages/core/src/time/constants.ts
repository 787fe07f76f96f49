/**
 * Time constants shared by the day-number converter and the calculator.
 */

/**
 * Milliseconds in one hour.
 */
export const MS_PER_HOUR = 3_600_000;

/**
 * Milliseconds in one day.
 */
export const MS_PER_DAY = 86_400_000;

/**
 * Julian Day of the Unix epoch (1970-01-01T00:00:00Z).
 */
export const UNIX_EPOCH_JULIAN_DAY = 2440587.5;

/**
 * Julian Day of the J2000.0 epoch (2000-01-01T12:00:00 TT).
 */
export const J2000_JULIAN_DAY = 2451545;

/**
 * Days per Julian century.
 */
export const DAYS_PER_JULIAN_CENTURY = 36525;

/**
 * Degrees of hour angle the sun sweeps per hour.
 */
export const DEGREES_PER_HOUR = 15;
