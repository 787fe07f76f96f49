/**
 * Calculation method profiles and asr conventions.
 */

import type { AsrConvention, CalculationMethod, MethodProfile } from './types.js';

const NINETY_MINUTES_MS = 90 * 60 * 1000;

function angles(fajrAngle: number, ishaAngle: number): MethodProfile {
  return { fajrAngle, ishaAngle, maghribDurationMs: 0 };
}

function fixedIsha(fajrAngle: number, maghribDurationMs: number): MethodProfile {
  return { fajrAngle, ishaAngle: 0, maghribDurationMs };
}

/**
 * Default twilight angles per calculation method.
 */
export const METHOD_PROFILES: Readonly<Record<CalculationMethod, MethodProfile>> = {
  default: angles(18, 17),
  mwl: angles(18, 17),
  algerian: angles(18, 17),
  diyanet: angles(18, 17),
  isna: angles(15, 15),
  ummAlQura: fixedIsha(18.5, NINETY_MINUTES_MS),
  gulf: fixedIsha(19.5, NINETY_MINUTES_MS),
  karachi: angles(18, 18),
  france18: angles(18, 18),
  tunisia: angles(18, 18),
  egypt: angles(19.5, 17.5),
  egyptBis: angles(20, 18),
  kemenag: angles(20, 18),
  muis: angles(20, 18),
  jakim: angles(20, 18),
  uoif: angles(12, 12),
  france15: angles(15, 15),
  tehran: angles(17.7, 14),
  jafari: angles(16, 14),
};

/**
 * All calculation method identifiers.
 */
export const CALCULATION_METHODS = [
  'default',
  'mwl',
  'algerian',
  'diyanet',
  'isna',
  'ummAlQura',
  'gulf',
  'karachi',
  'france18',
  'tunisia',
  'egypt',
  'egyptBis',
  'kemenag',
  'muis',
  'jakim',
  'uoif',
  'france15',
  'tehran',
  'jafari',
] as const satisfies readonly CalculationMethod[];

export const ASR_CONVENTIONS = ['shafii', 'hanafi'] as const satisfies readonly AsrConvention[];

/**
 * Shadow-length multiplier of each asr convention.
 */
export const ASR_COEFFICIENTS: Readonly<Record<AsrConvention, number>> = {
  shafii: 1,
  hanafi: 2,
};

export function getMethodProfile(method: CalculationMethod): MethodProfile {
  return METHOD_PROFILES[method];
}

export function getAsrCoefficient(convention: AsrConvention): number {
  return ASR_COEFFICIENTS[convention];
}
