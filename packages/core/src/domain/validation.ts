/**
 * Zod validation schemas for calculator configuration.
 */

import { z } from 'zod';
import { ASR_CONVENTIONS, CALCULATION_METHODS } from './methods.js';
import type { Target } from './types.js';

/**
 * Schema for Target names.
 */
export const targetSchema = z.enum([
  'fajr',
  'sunrise',
  'zuhr',
  'asr',
  'maghrib',
  'isha',
]) satisfies z.ZodType<Target>;

/**
 * Schema for CalculationMethod.
 */
export const calculationMethodSchema = z.enum(CALCULATION_METHODS);

/**
 * Schema for AsrConvention.
 */
export const asrConventionSchema = z.enum(ASR_CONVENTIONS);

/**
 * Schema for a per-target correction table (finite numbers, any subset of targets).
 */
export const targetCorrectionsSchema = z.record(targetSchema, z.number().finite());

/**
 * Schema for the calculator configuration block.
 *
 * Latitude and longitude are only checked for being finite; no physical range is enforced.
 * Zero (or missing) angles and durations fall back to the calculation method's defaults.
 */
export const calculatorConfigSchema = z.object({
  latitude: z.number().finite(),
  longitude: z.number().finite(),
  /** Meters above sea level */
  elevation: z.number().finite().min(0).default(0),
  /** Degrees below the horizon */
  fajrAngle: z.number().finite().min(0).max(90).default(0),
  /** Degrees below the horizon */
  ishaAngle: z.number().finite().min(0).max(90).default(0),
  maghribDurationMs: z.number().int().min(0).default(0),
  calculationMethod: calculationMethodSchema.default('default'),
  asrConvention: asrConventionSchema.default('shafii'),
  preciseToSeconds: z.boolean().default(false),
  ignoreElevation: z.boolean().default(false),
  /** Degrees of hour angle added per target */
  angleCorrections: targetCorrectionsSchema.default({}),
  /** Milliseconds added per target */
  timeCorrectionsMs: targetCorrectionsSchema.default({}),
});

/**
 * Calculator configuration as supplied by callers.
 */
export type CalculatorConfig = z.input<typeof calculatorConfigSchema>;

/**
 * Calculator configuration with every default filled in.
 */
export type ParsedCalculatorConfig = z.output<typeof calculatorConfigSchema>;

