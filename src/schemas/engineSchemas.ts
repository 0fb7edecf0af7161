/**
 * Engine Schemas
 *
 * Zod schemas for engine configuration and for the numeric parameters that
 * callers hand to the fluent tween/timeline API.
 *
 * @module schemas/engineSchemas
 */

import { z } from 'zod';
import { InvalidParameterError } from '@/core/errors';

// =============================================================================
// Timing Schemas
// =============================================================================

/**
 * Any finite time offset in milliseconds (pauses may be negative)
 */
export const TimeOffsetMs = z.number().finite().describe('Finite time offset in milliseconds');

/**
 * Non-negative duration in milliseconds
 */
export const DurationMs = z
  .number()
  .finite()
  .nonnegative()
  .describe('Duration in milliseconds (non-negative)');

/**
 * Repetition count; -1 means "repeat forever"
 */
export const RepeatCount = z
  .number()
  .int()
  .min(-1)
  .describe('Number of extra iterations, or -1 for infinite');

/**
 * Target value of a tweened attribute
 */
export const AttributeValue = z.number().finite();

// =============================================================================
// Configuration Schemas
// =============================================================================

export const LogLevelNameSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const EngineConfigSchema = z
  .object({
    /** Whether freed units go back to their pool */
    poolingEnabled: z.boolean(),
    /** Maximum number of attributes one tween may animate */
    combinedAttributesLimit: z.number().int().min(1).max(64),
    logLevel: LogLevelNameSchema,
  })
  .strict();

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export const EngineConfigPatchSchema = EngineConfigSchema.partial();

export type EngineConfigPatch = z.infer<typeof EngineConfigPatchSchema>;

// =============================================================================
// Validation Helpers
// =============================================================================

/**
 * Join zod issues as `path: message; ...`.
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

/**
 * Parse `value` or throw an {@link InvalidParameterError} naming `parameter`.
 */
export function parseParameter<T>(schema: z.ZodType<T>, value: unknown, parameter: string): T {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }
  throw new InvalidParameterError(parameter, formatIssues(result.error));
}
