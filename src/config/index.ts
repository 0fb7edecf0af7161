/**
 * Configuration Module
 */

export {
  DEFAULT_ENGINE_CONFIG,
  getEngineConfig,
  setEngineConfig,
  resetEngineConfig,
  isPoolingEnabled,
} from './engineConfig';
