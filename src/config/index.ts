/**
 * @fileoverview Engine configuration entry point
 *
 * - `engine_config`: zod schema, defaults, YAML + HRC_* environment loading
 */

export {
  EngineConfigSchema,
  FailureKindSchema,
  DEFAULT_ENGINE_CONFIG,
  ENV_OVERRIDES,
  resolveEngineConfig,
  loadEngineConfig,
  configFromEnv,
  mergeConfig,
  type EngineConfig,
  type EngineConfigInput,
  type LoadEngineConfigOptions,
} from './engine_config.js';
