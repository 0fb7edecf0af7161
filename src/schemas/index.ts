/**
 * Schemas Index
 *
 * Exports all schema definitions for validation.
 */

export {
  TimeOffsetMs,
  DurationMs,
  RepeatCount,
  AttributeValue,
  LogLevelNameSchema,
  EngineConfigSchema,
  EngineConfigPatchSchema,
  formatIssues,
  parseParameter,
  type EngineConfig,
  type EngineConfigPatch,
} from './engineSchemas';
