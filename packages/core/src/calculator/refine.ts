/**
 * Fixed-point refinement of a target time.
 *
 * Transit time and declination depend on the instant they are evaluated at,
 * and that instant is the very time being solved for. Each pass solves with
 * the previous estimate and re-evaluates the sun at the new candidate.
 */

import type { Decimal } from 'decimal.js';
import { getSunAltitude, getSunDeclination, getTransitTime } from '../astro/sunPosition.js';
import { solveHourAngle } from '../astro/hourAngle.js';
import { applyCorrections } from '../domain/corrections.js';
import { classifyTarget } from '../domain/targets.js';
import type { ResolvedSettings, Target, TargetTime } from '../domain/types.js';
import { DEGREES_PER_HOUR } from '../time/constants.js';
import { hoursToInstant } from '../time/civilDate.js';
import { toJulianDay } from '../time/julianDay.js';
import type { DaySnapshot } from './daySnapshot.js';

/**
 * Upper bound on refinement passes. The last candidate is returned if it has not settled by then.
 */
export const MAX_REFINEMENT_ITERATIONS = 5;

/**
 * Two candidates closer than this (after rounding the difference to whole seconds) have converged.
 */
export const CONVERGENCE_TOLERANCE_SECONDS = 1;

/**
 * Local clock hour for an hour angle on the given side of the transit.
 */
export function hoursFromTransit(
  target: Target,
  transitTime: Decimal,
  hourAngle: Decimal,
): Decimal {
  const offset = hourAngle.div(DEGREES_PER_HOUR);
  switch (classifyTarget(target)) {
    case 'beforeTransit':
      return transitTime.minus(offset);
    case 'afterTransit':
      return transitTime.plus(offset);
    case 'transit':
      return transitTime;
  }
}

function hasConverged(previous: Date, candidate: Date): boolean {
  const diffSeconds = Math.round((previous.getTime() - candidate.getTime()) / 1000);
  return Math.abs(diffSeconds) < CONVERGENCE_TOLERANCE_SECONDS;
}

/**
 * Sun state a refinement pass solves against.
 */
interface PassState {
  readonly transitTime: Decimal;
  readonly sunDeclination: Decimal;
  readonly sunAltitude: Decimal;
}

function solvePass(
  target: Target,
  snapshot: DaySnapshot,
  settings: ResolvedSettings,
  state: PassState,
): Date | undefined {
  const hourAngle = solveHourAngle(state.sunAltitude, state.sunDeclination, settings.latitude);
  if (hourAngle.kind === 'unavailable') {
    return undefined;
  }

  const hours = applyCorrections(
    hoursFromTransit(target, state.transitTime, hourAngle.degrees),
    target,
    settings,
  );
  return hoursToInstant(snapshot.date, hours, snapshot.offsetHours, settings.preciseToSeconds);
}

/**
 * Re-evaluates the sun at a candidate instant.
 */
function reevaluate(
  target: Target,
  snapshot: DaySnapshot,
  settings: ResolvedSettings,
  previous: PassState,
  candidate: Date,
): PassState {
  const julianDay = toJulianDay(candidate);
  const sunDeclination = getSunDeclination(julianDay);
  return {
    transitTime: getTransitTime(julianDay, settings.longitude, snapshot.offsetHours),
    sunDeclination,
    // Only the asr altitude depends on declination
    sunAltitude:
      target === 'asr' ? getSunAltitude(target, sunDeclination, settings) : previous.sunAltitude,
  };
}

/**
 * Solves an altitude-defined target (every target but zuhr) on a date.
 *
 * @returns The refined time, or `available: false` if the sun does not reach
 *   the target altitude at some pass
 * @throws Error when called for zuhr, which has no altitude to solve
 */
export function refineTargetTime(
  target: Target,
  snapshot: DaySnapshot,
  settings: ResolvedSettings,
): TargetTime {
  if (classifyTarget(target) === 'transit') {
    throw new Error(`[refineTargetTime] ${target} is the transit itself and is not refined`);
  }

  let state: PassState = {
    transitTime: snapshot.transitTime,
    sunDeclination: snapshot.sunDeclination,
    sunAltitude: getSunAltitude(target, snapshot.sunDeclination, settings),
  };
  let candidate = solvePass(target, snapshot, settings, state);
  if (candidate === undefined) {
    return { available: false };
  }

  for (let iteration = 2; iteration <= MAX_REFINEMENT_ITERATIONS; iteration++) {
    state = reevaluate(target, snapshot, settings, state, candidate);
    const next = solvePass(target, snapshot, settings, state);
    if (next === undefined) {
      return { available: false };
    }

    const converged = hasConverged(candidate, next);
    candidate = next;
    if (converged) {
      return { available: true, time: candidate };
    }
  }

  console.warn(
    `[refineTargetTime] ${target} did not converge after ${MAX_REFINEMENT_ITERATIONS} iterations on ${snapshot.noon.toISOString()}; using last estimate ${candidate.toISOString()}`,
  );
  return { available: true, time: candidate };
}
