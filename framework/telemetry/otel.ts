/**
 * OpenTelemetry Integration
 *
 * Spur depends only on `@opentelemetry/api`. Until the host process
 * registers an SDK and tracing is switched on (OTEL_ENABLED=true, or
 * `telemetry.enabled` in the application config), every helper here is inert.
 *
 * @module
 */

import {
  context,
  INVALID_SPAN_CONTEXT,
  propagation,
  SpanKind,
  SpanStatusCode,
  trace,
  type Attributes,
  type Context,
  type Span,
  type Tracer,
} from '@opentelemetry/api';
import { Environment } from '../runtime/environment.ts';

const TRACER_NAME = 'spur';
const TRACER_VERSION = '0.1.0';

export interface OTELConfig {
  enabled: boolean;
  serviceName: string;
}

export interface CreateSpanOptions {
  /** Defaults to INTERNAL */
  kind?: SpanKind;
  attributes?: Attributes;
  /** Defaults to the active context */
  parentContext?: Context;
  /** Overrides the OTEL_ENABLED switch, e.g. from application config */
  enabled?: boolean;
  /** Instrumentation scope; the application passes its service name */
  tracerName?: string;
}

export function isOTELEnabled(): boolean {
  return Environment.get('OTEL_ENABLED') === 'true';
}

export function getOTELConfig(): OTELConfig {
  return {
    enabled: isOTELEnabled(),
    serviceName: Environment.get('OTEL_SERVICE_NAME') ?? 'spur',
  };
}

export function getOTELTracer(name = TRACER_NAME): Tracer {
  return trace.getTracer(name, TRACER_VERSION);
}

/**
 * The active span; only enabled `withSpan` calls or the host activate one
 */
export function getActiveSpan(): Span | undefined {
  return trace.getActiveSpan();
}

/**
 * Name the active span after the matched route, e.g. `GET /users/{id}`
 */
export function setRouteAttribute(routePattern: string, method: string): void {
  const span = getActiveSpan();
  if (!span) return;

  span.setAttribute('http.route', routePattern);
  span.updateName(`${method} ${routePattern}`);
}

export function recordSpanException(error: Error, message = error.message): void {
  const span = getActiveSpan();
  if (!span) return;

  span.recordException(error);
  span.setStatus({ code: SpanStatusCode.ERROR, message });
}

/**
 * Parent context from `traceparent`/`tracestate` request headers
 */
export function extractContextFromHeaders(
  headers: Readonly<Record<string, string>>,
  enabled = isOTELEnabled(),
): Context {
  const active = context.active();
  return enabled ? propagation.extract(active, { ...headers }) : active;
}

/**
 * Run `fn` inside a new active span that ends when `fn` settles.
 * A rejection marks the span as failed and is rethrown.
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span) => Promise<T>,
  options: CreateSpanOptions = {},
): Promise<T> {
  if (!(options.enabled ?? isOTELEnabled())) {
    return await runInSpan(trace.wrapSpanContext(INVALID_SPAN_CONTEXT), fn, false);
  }

  return await getOTELTracer(options.tracerName).startActiveSpan(
    name,
    { kind: options.kind ?? SpanKind.INTERNAL, attributes: options.attributes },
    options.parentContext ?? context.active(),
    (span) => runInSpan(span, fn, true),
  );
}

async function runInSpan<T>(span: Span, fn: (span: Span) => Promise<T>, record: boolean): Promise<T> {
  try {
    const result = await fn(span);
    if (record) span.setStatus({ code: SpanStatusCode.OK });
    return result;
  } catch (error) {
    if (record) {
      const failure = error instanceof Error ? error : new Error(String(error));
      span.recordException(failure);
      span.setStatus({ code: SpanStatusCode.ERROR, message: failure.message });
    }
    throw error;
  } finally {
    span.end();
  }
}

export {
  trace,
  context,
  SpanKind,
  SpanStatusCode,
  type Tracer,
  type Span,
  type Context,
  type Attributes,
};
