/**
 * Spur
 *
 * A minimal HTTP request-routing layer for Node.js.
 *
 * @module spur
 */

// Application
export { Application, createApp, type ApplicationOptions } from './app.ts';

// Configuration
export {
  Config,
  ConfigValidationError,
  loadConfig,
  type ConfigOptions,
  type ResolvedConfig,
} from './config/mod.ts';

// HTTP
export {
  SpurRequest,
  SpurResponse,
  type SpurRequestInit,
  Server,
  HttpException,
  RouteConfigurationError,
  ResponseFinalizedError,
  BodyParserRegistry,
  BaseParser,
  FormParser,
  JsonParser,
  PlainTextParser,
  defaultParsers,
  type BodyParser,
  type ErrorEnvelope,
  type Handler,
  type HttpMethod,
  type Outcome,
  type RouteParams,
  type RequestSource,
  type ResponseSink,
  type FinalizedResponse,
  type RawRequest,
} from './http/mod.ts';

// Router
export { Router, Route, RouteAddress, type RouteSummary } from './router/mod.ts';

// Runtime
export { Environment, type EnvironmentMode } from './runtime/mod.ts';

// Telemetry
export { Logger, getLogger, setLogger, type LogEntry, type LogLevel } from './telemetry/mod.ts';
