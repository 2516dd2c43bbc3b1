/**
 * Configuration & Environment Management
 *
 * Defaults, JSON config file and environment variable overrides.
 */

export {
  Config,
  ConfigValidationError,
  loadConfig,
  parseConfigOptions,
  envConfigOptions,
  combineOptions,
  type ConfigOptions,
  type ResolvedConfig,
  type TelemetryOptions,
} from './config.ts';
