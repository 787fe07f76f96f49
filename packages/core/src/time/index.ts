/**
 * Calendar and day-number utilities.
 *
 * - Julian Day conversion for the solar position formulas
 * - Civil dates anchored to a time zone, local noon and zone offsets
 */

export * from './constants.js';
export * from './julianDay.js';
export * from './civilDate.js';
