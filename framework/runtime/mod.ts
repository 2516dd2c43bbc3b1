/**
 * Runtime Environment
 *
 * Process environment access shared by configuration, logging and tracing.
 */

export { Environment, type EnvironmentMode } from './environment.ts';
