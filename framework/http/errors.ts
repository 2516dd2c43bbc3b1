/**
 * HTTP Errors
 *
 * Structured failures that render into the uniform JSON error envelope,
 * plus the configuration-time errors raised while wiring an application.
 */

export type ErrorDetails = Record<string, unknown>;

/**
 * Wire shape of every error response body
 */
export interface ErrorEnvelope {
  status: number;
  error: {
    code: string;
    message: string;
    details: ErrorDetails;
  };
}

/**
 * An HTTP-level failure carrying everything needed to render a response
 */
export class HttpException extends Error {
  readonly status: number;
  readonly details: Readonly<ErrorDetails>;
  readonly headers: Readonly<Record<string, string>>;

  constructor(
    status: number,
    message: string,
    details: ErrorDetails = {},
    headers: Record<string, string> = {}
  ) {
    super(message);
    this.name = 'HttpException';
    this.status = status;
    this.details = Object.freeze({ ...details });
    this.headers = Object.freeze({ ...headers });
  }

  /**
   * Envelope code, e.g. `http_error_415`
   */
  get code(): string {
    return `http_error_${this.status}`;
  }

  toEnvelope(): ErrorEnvelope {
    return {
      status: this.status,
      error: {
        code: this.code,
        message: this.message,
        details: { ...this.details },
      },
    };
  }

  static unsupportedMediaType(
    contentType: string,
    allowedContentTypes: string[] = []
  ): HttpException {
    const message = contentType.length > 0
      ? `Unsupported content type: ${contentType}`
      : 'No content type given';

    return new HttpException(415, message, {
      allowed_content_types: allowedContentTypes,
    });
  }

  static internalServerError(message: string, details: ErrorDetails = {}): HttpException {
    return new HttpException(500, message, details);
  }
}

/**
 * Raised while compiling a route pattern that cannot be turned into a matcher
 */
export class RouteConfigurationError extends Error {
  readonly pattern: string;

  constructor(pattern: string, reason: string) {
    super(`Invalid route pattern "${pattern}": ${reason}`);
    this.name = 'RouteConfigurationError';
    this.pattern = pattern;
  }
}

/**
 * Raised when a response is touched after it was handed to the transport
 */
export class ResponseFinalizedError extends Error {
  constructor(operation: string) {
    super(`Cannot ${operation}: response already sent`);
    this.name = 'ResponseFinalizedError';
  }
}

export function isHttpException(error: unknown): error is HttpException {
  return error instanceof HttpException;
}

/**
 * Convert anything thrown into an HttpException, keeping HTTP failures as-is
 */
export function toHttpException(error: unknown): HttpException {
  if (isHttpException(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return HttpException.internalServerError(message);
}
