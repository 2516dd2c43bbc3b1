/**
 * Configuration Management
 *
 * Loads application configuration from defaults, an optional JSON file
 * and environment variables, in that order of precedence.
 */

import { readFile } from 'node:fs/promises';
import { Environment, type EnvironmentMode } from '../runtime/environment.ts';
import { isLogLevel, type LogFormat, type LogLevel } from '../telemetry/logger.ts';

export interface TelemetryOptions {
  enabled: boolean;
  serviceName: string;
}

export interface ResolvedConfig {
  port: number;
  host: string;
  env: EnvironmentMode;
  logLevel: LogLevel;
  logFormat: LogFormat;
  /** Routing prefix stripped from request paths */
  basePath: string;
  telemetry: TelemetryOptions;
}

export type ConfigOptions = Partial<Omit<ResolvedConfig, 'telemetry'>> & {
  telemetry?: Partial<TelemetryOptions>;
};

const ENVIRONMENT_MODES: readonly EnvironmentMode[] = ['development', 'production', 'test'];

/**
 * Defaults follow the process environment, so `env` always agrees with
 * `Environment.mode()` unless set explicitly
 */
function defaultConfig(): ResolvedConfig {
  return {
    port: 8000,
    host: '0.0.0.0',
    env: Environment.mode(),
    logLevel: 'info',
    logFormat: 'pretty',
    basePath: '',
    telemetry: {
      enabled: Environment.get('OTEL_ENABLED') === 'true',
      serviceName: Environment.get('OTEL_SERVICE_NAME') ?? 'spur',
    },
  };
}

const DEFAULT_CONFIG_PATHS = ['./config/app.json', './spur.json'];

export class ConfigValidationError extends Error {
  readonly field: string;

  constructor(field: string, expected: string) {
    super(`Invalid configuration: "${field}" must be ${expected}`);
    this.name = 'ConfigValidationError';
    this.field = field;
  }
}

/**
 * Configuration manager
 */
export class Config {
  private config: ResolvedConfig;

  constructor(options: ConfigOptions = {}) {
    const defaults = defaultConfig();
    const env = options.env ?? defaults.env;
    this.config = mergeConfig(
      { ...defaults, logFormat: env === 'production' ? 'json' : 'pretty' },
      options
    );
  }

  get<K extends keyof ResolvedConfig>(key: K): ResolvedConfig[K] {
    return this.config[key];
  }

  set<K extends keyof ResolvedConfig>(key: K, value: ResolvedConfig[K]): void {
    this.config = { ...this.config, [key]: value };
  }

  has(key: string): boolean {
    return Object.hasOwn(this.config, key);
  }

  all(): ResolvedConfig {
    return { ...this.config, telemetry: { ...this.config.telemetry } };
  }
}

function mergeConfig(base: ResolvedConfig, override: ConfigOptions): ResolvedConfig {
  const merged = combineOptions(base, override);
  return {
    ...base,
    ...merged,
    telemetry: { ...base.telemetry, ...merged.telemetry },
  };
}

/**
 * Validate parsed JSON against the known configuration fields
 */
export function parseConfigOptions(value: unknown): ConfigOptions {
  if (!isRecord(value)) {
    throw new ConfigValidationError('<root>', 'an object');
  }

  const options: ConfigOptions = {};

  if (value.port !== undefined) {
    if (typeof value.port !== 'number' || !Number.isInteger(value.port)) {
      throw new ConfigValidationError('port', 'an integer');
    }
    options.port = value.port;
  }
  if (value.host !== undefined) {
    options.host = requireString('host', value.host);
  }
  if (value.env !== undefined) {
    if (!isEnvironmentMode(value.env)) {
      throw new ConfigValidationError('env', 'one of development, production, test');
    }
    options.env = value.env;
  }
  if (value.logLevel !== undefined) {
    if (!isLogLevel(value.logLevel)) {
      throw new ConfigValidationError('logLevel', 'one of debug, info, warn, error');
    }
    options.logLevel = value.logLevel;
  }
  if (value.logFormat !== undefined) {
    if (value.logFormat !== 'json' && value.logFormat !== 'pretty') {
      throw new ConfigValidationError('logFormat', '"json" or "pretty"');
    }
    options.logFormat = value.logFormat;
  }
  if (value.basePath !== undefined) {
    options.basePath = requireString('basePath', value.basePath);
  }
  if (value.telemetry !== undefined) {
    const telemetry = value.telemetry;
    if (!isRecord(telemetry)) {
      throw new ConfigValidationError('telemetry', 'an object');
    }
    options.telemetry = {};
    if (telemetry.enabled !== undefined) {
      if (typeof telemetry.enabled !== 'boolean') {
        throw new ConfigValidationError('telemetry.enabled', 'a boolean');
      }
      options.telemetry.enabled = telemetry.enabled;
    }
    if (telemetry.serviceName !== undefined) {
      options.telemetry.serviceName = requireString('telemetry.serviceName', telemetry.serviceName);
    }
  }

  return options;
}

/**
 * Configuration from environment variables
 */
export function envConfigOptions(): ConfigOptions {
  const options: ConfigOptions = {};

  const port = Environment.get('PORT');
  if (port !== undefined) {
    const parsed = Number.parseInt(port, 10);
    if (Number.isNaN(parsed)) {
      throw new ConfigValidationError('PORT', 'an integer');
    }
    options.port = parsed;
  }

  options.host = Environment.get('HOST');
  if (Environment.get('NODE_ENV') !== undefined) {
    options.env = Environment.mode();
  }
  options.basePath = Environment.get('SPUR_BASE_PATH');

  const logLevel = Environment.get('LOG_LEVEL');
  if (logLevel !== undefined) {
    if (!isLogLevel(logLevel)) {
      throw new ConfigValidationError('LOG_LEVEL', 'one of debug, info, warn, error');
    }
    options.logLevel = logLevel;
  }

  const otelEnabled = Environment.get('OTEL_ENABLED');
  const serviceName = Environment.get('OTEL_SERVICE_NAME');
  if (otelEnabled !== undefined || serviceName !== undefined) {
    options.telemetry = {
      enabled: otelEnabled === undefined ? undefined : otelEnabled === 'true',
      serviceName,
    };
  }

  return options;
}

/**
 * Load configuration from a JSON file and the environment
 *
 * An explicit path must exist; default locations are skipped when absent.
 */
export async function loadConfig(configPath?: string): Promise<Config> {
  let fileConfig: ConfigOptions = {};

  if (configPath) {
    fileConfig = parseConfigOptions(JSON.parse(await readFile(configPath, 'utf8')));
  } else {
    for (const path of DEFAULT_CONFIG_PATHS) {
      const content = await readOptionalFile(path);
      if (content !== null) {
        fileConfig = parseConfigOptions(JSON.parse(content));
        break;
      }
    }
  }

  return new Config(combineOptions(fileConfig, envConfigOptions()));
}

/**
 * Overlay defined values of `override` onto `base`
 */
export function combineOptions(base: ConfigOptions, override: ConfigOptions): ConfigOptions {
  const { telemetry, ...rest } = override;
  const result: ConfigOptions = { ...base };

  for (const [key, value] of Object.entries(rest)) {
    if (value !== undefined) {
      Object.assign(result, { [key]: value });
    }
  }

  if (telemetry) {
    result.telemetry = { ...base.telemetry };
    if (telemetry.enabled !== undefined) result.telemetry.enabled = telemetry.enabled;
    if (telemetry.serviceName !== undefined) result.telemetry.serviceName = telemetry.serviceName;
  }

  return result;
}

async function readOptionalFile(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    if (isRecord(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

function requireString(field: string, value: unknown): string {
  if (typeof value !== 'string') {
    throw new ConfigValidationError(field, 'a string');
  }
  return value;
}

function isEnvironmentMode(value: unknown): value is EnvironmentMode {
  return ENVIRONMENT_MODES.some((mode) => mode === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
