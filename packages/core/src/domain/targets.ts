import type { Target, TargetPhase } from './types.js';

/**
 * All targets in chronological order. Iteration order for calculating a full day.
 */
export const TARGETS: readonly Target[] = [
  'fajr',
  'sunrise',
  'zuhr',
  'asr',
  'maghrib',
  'isha',
];

const TARGET_PHASES: Readonly<Record<Target, TargetPhase>> = {
  fajr: 'beforeTransit',
  sunrise: 'beforeTransit',
  zuhr: 'transit',
  asr: 'afterTransit',
  maghrib: 'afterTransit',
  isha: 'afterTransit',
};

/**
 * Classifies a target relative to the sun's meridian transit.
 *
 * @example
 * classifyTarget('fajr') // 'beforeTransit'
 * classifyTarget('zuhr') // 'transit'
 * classifyTarget('isha') // 'afterTransit'
 */
export function classifyTarget(target: Target): TargetPhase {
  return TARGET_PHASES[target];
}
