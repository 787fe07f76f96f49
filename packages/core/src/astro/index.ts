/**
 * Solar position and hour-angle solving.
 */

export * from './sunPosition.js';
export * from './hourAngle.js';
