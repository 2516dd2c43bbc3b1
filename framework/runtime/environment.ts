/**
 * Environment Access
 *
 * Reads process environment variables and the runtime mode.
 */

export type EnvironmentMode = 'development' | 'production' | 'test';

export class Environment {
  /**
   * Get an environment variable with optional default
   */
  static get(key: string, defaultValue?: string): string | undefined {
    return process.env[key] ?? defaultValue;
  }

  /**
   * Get a required environment variable (throws if not set)
   */
  static require(key: string): string {
    const value = process.env[key];
    if (value === undefined) {
      throw new Error(`Required environment variable ${key} is not set`);
    }
    return value;
  }

  static set(key: string, value: string): void {
    process.env[key] = value;
  }

  static delete(key: string): void {
    delete process.env[key];
  }

  /**
   * Runtime mode from NODE_ENV, defaulting to development
   */
  static mode(): EnvironmentMode {
    const value = process.env.NODE_ENV;
    if (value === 'production' || value === 'test') {
      return value;
    }
    return 'development';
  }
}
