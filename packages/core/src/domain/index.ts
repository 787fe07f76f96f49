/**
 * Domain module public exports.
 * Targets, calculation methods, configuration validation and corrections.
 */

// Types
export type {
  Target,
  TargetPhase,
  CalculationMethod,
  AsrConvention,
  MethodProfile,
  TargetCorrections,
  ResolvedSettings,
  TargetTime,
} from './types.js';

// Targets
export { TARGETS, classifyTarget } from './targets.js';

// Methods and conventions
export {
  METHOD_PROFILES,
  CALCULATION_METHODS,
  ASR_COEFFICIENTS,
  ASR_CONVENTIONS,
  getMethodProfile,
  getAsrCoefficient,
} from './methods.js';

// Validation schemas
export type { CalculatorConfig, ParsedCalculatorConfig } from './validation.js';
export {
  targetSchema,
  calculationMethodSchema,
  asrConventionSchema,
  targetCorrectionsSchema,
  calculatorConfigSchema,
} from './validation.js';

// Corrections
export { resolveSettings, applyCorrections } from './corrections.js';
