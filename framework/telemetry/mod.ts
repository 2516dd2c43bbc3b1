/**
 * Telemetry & Observability
 *
 * Structured logging and OpenTelemetry spans.
 */

export {
  Logger,
  getLogger,
  setLogger,
  createRequestLogger,
  formatPretty,
  isLogLevel,
  type LogContext,
  type LogOutput,
  type SerializedError,
  type LogLevel,
  type LogFormat,
  type LogEntry,
  type LoggerOptions,
  type RequestLogContext,
} from './logger.ts';

export {
  isOTELEnabled,
  getOTELConfig,
  getActiveSpan,
  setRouteAttribute,
  recordSpanException,
  getOTELTracer,
  extractContextFromHeaders,
  withSpan,
  trace,
  context,
  SpanKind,
  SpanStatusCode,
  type OTELConfig,
  type CreateSpanOptions,
  type Tracer as OTELTracer,
  type Span as OTELSpan,
  type Context as OTELContext,
  type Attributes as OTELAttributes,
} from './otel.ts';
