/**
 * Prayer time calculation from the apparent position of the sun.
 * Pure TypeScript logic with no framework dependencies.
 */

/**
 * Re-export decimal arithmetic and degree trigonometry.
 */
export * from './math/decimal.js';

/**
 * Re-export Julian Day conversion and civil date utilities.
 */
export * from './time/index.js';

/**
 * Re-export targets, calculation methods, validation and corrections.
 */
export * from './domain/index.js';

/**
 * Re-export solar position and hour-angle solving.
 */
export * from './astro/index.js';

/**
 * Re-export the calculator.
 */
export * from './calculator/index.js';
