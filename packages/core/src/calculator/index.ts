/**
 * Prayer time calculator: per-date state, refinement loop and facade.
 */

export * from './daySnapshot.js';
export * from './refine.js';
export * from './calculator.js';
