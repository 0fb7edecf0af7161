/**
 * Engine Configuration
 *
 * Engine-wide settings with code defaults, environment overrides and
 * runtime updates. Every change is validated against
 * {@link EngineConfigSchema}.
 *
 * Environment variables (read on first access and on reset):
 * - `TWEEN_POOLING`: `true`/`false`/`1`/`0`
 * - `TWEEN_ATTR_LIMIT`: combined attributes limit
 * - `TWEEN_LOG_LEVEL`: `debug` | `info` | `warn` | `error` | `silent`
 *
 * @example
 * ```typescript
 * import { setEngineConfig } from '@/config';
 *
 * setEngineConfig({ poolingEnabled: false, logLevel: 'debug' });
 * ```
 */

import {
  EngineConfigPatchSchema,
  EngineConfigSchema,
  formatIssues,
  type EngineConfig,
  type EngineConfigPatch,
} from '@/schemas/engineSchemas';
import { ConfigurationError } from '@/core/errors';
import { createLogger, logLevelFromName, setGlobalLogLevel } from '@/services/logger';

const logger = createLogger('EngineConfig');

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = Object.freeze({
  poolingEnabled: true,
  combinedAttributesLimit: 3,
  logLevel: 'warn',
});

const CONFIG_KEYS: readonly (keyof EngineConfig)[] = [
  'poolingEnabled',
  'combinedAttributesLimit',
  'logLevel',
];

const ENV_KEYS: Record<keyof EngineConfig, string> = {
  poolingEnabled: 'TWEEN_POOLING',
  combinedAttributesLimit: 'TWEEN_ATTR_LIMIT',
  logLevel: 'TWEEN_LOG_LEVEL',
};

// =============================================================================
// Module State
// =============================================================================

let current: EngineConfig | null = null;

// =============================================================================
// Environment
// =============================================================================

function parseEnvBoolean(raw: string): boolean | string {
  const value = raw.trim().toLowerCase();
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  return raw;
}

function parseEnvNumber(raw: string): number | string {
  const value = Number(raw);
  return raw.trim() !== '' && Number.isFinite(value) ? value : raw;
}

/**
 * Collect overrides from the environment. Each variable is validated on its
 * own so one bad value does not discard the others.
 */
function readEnvironmentOverrides(env: NodeJS.ProcessEnv = process.env): EngineConfigPatch {
  const candidates: Partial<Record<keyof EngineConfig, unknown>> = {};

  const pooling = env[ENV_KEYS.poolingEnabled];
  if (pooling !== undefined) candidates.poolingEnabled = parseEnvBoolean(pooling);

  const attributeLimit = env[ENV_KEYS.combinedAttributesLimit];
  if (attributeLimit !== undefined) candidates.combinedAttributesLimit = parseEnvNumber(attributeLimit);

  const logLevel = env[ENV_KEYS.logLevel];
  if (logLevel !== undefined) candidates.logLevel = logLevel.trim().toLowerCase();

  const overrides: EngineConfigPatch = {};

  for (const key of CONFIG_KEYS) {
    if (!(key in candidates)) continue;

    const result = EngineConfigPatchSchema.safeParse({ [key]: candidates[key] });
    if (result.success) {
      Object.assign(overrides, result.data);
    } else {
      logger.warn('Ignoring invalid environment override', {
        variable: ENV_KEYS[key],
        reason: formatIssues(result.error),
      });
    }
  }

  return overrides;
}

// =============================================================================
// Public API
// =============================================================================

function apply(config: EngineConfig): EngineConfig {
  current = config;
  setGlobalLogLevel(logLevelFromName(config.logLevel));
  return config;
}

/**
 * Current configuration (defaults merged with environment on first call).
 */
export function getEngineConfig(): Readonly<EngineConfig> {
  if (current === null) {
    return apply({ ...DEFAULT_ENGINE_CONFIG, ...readEnvironmentOverrides() });
  }
  return current;
}

/**
 * Merge a partial update into the configuration.
 *
 * @throws ConfigurationError when any field is invalid; nothing is applied then
 */
export function setEngineConfig(patch: EngineConfigPatch): Readonly<EngineConfig> {
  const result = EngineConfigSchema.safeParse({ ...getEngineConfig(), ...patch });

  if (!result.success) {
    const field = result.error.issues[0]?.path.join('.') ?? 'unknown';
    throw new ConfigurationError(`Invalid engine configuration: ${formatIssues(result.error)}`, field);
  }

  logger.debug('Engine configuration updated', { patch });
  return apply(result.data);
}

/**
 * Drop runtime changes and re-read defaults and environment.
 */
export function resetEngineConfig(): Readonly<EngineConfig> {
  current = null;
  return getEngineConfig();
}

/**
 * Whether freed tweens and timelines return to their pools.
 */
export function isPoolingEnabled(): boolean {
  return getEngineConfig().poolingEnabled;
}
