/**
 * Application Class
 *
 * The main entry point for building Spur applications. Wires body parsers
 * and the router, and is the single top-level error boundary: every
 * HttpException surfacing from request decoding or routing is rendered as
 * the uniform JSON error envelope.
 */

import { randomUUID } from 'node:crypto';
import { Config, type ConfigOptions } from './config/config.ts';
import { toHttpException, type HttpException } from './http/errors.ts';
import { BodyParserRegistry, defaultParsers, type BodyParser } from './http/parsers.ts';
import { SpurRequest } from './http/request.ts';
import { SpurResponse } from './http/response.ts';
import { Server, type ListenAddress, type ServerOptions } from './http/server.ts';
import type { Handler, RequestSource, ResponseSink } from './http/types.ts';
import { Router, type RouteSummary } from './router/router.ts';
import { createRequestLogger, getLogger, Logger } from './telemetry/logger.ts';
import {
  extractContextFromHeaders,
  recordSpanException,
  SpanKind,
  withSpan,
} from './telemetry/otel.ts';

export interface ApplicationOptions {
  /** Body parsers in matching order (default: form, JSON, plain-text fallback) */
  parsers?: BodyParser[];
  config?: Config | ConfigOptions;
  logger?: Logger;
  /** Request source used by `start()` when no request is given */
  source?: RequestSource;
  /** Transport used by `start()` when no response is given */
  sink?: ResponseSink;
}

/**
 * Main Application class
 */
export class Application {
  private readonly router: Router;
  private readonly parsers: BodyParserRegistry;
  private readonly config: Config;
  private readonly logger: Logger;
  private readonly source?: RequestSource;
  private readonly sink?: ResponseSink;
  private server: Server | null = null;

  constructor(options: ApplicationOptions = {}) {
    this.router = new Router();
    this.parsers = new BodyParserRegistry(options.parsers ?? defaultParsers());
    this.config = options.config instanceof Config ? options.config : new Config(options.config);
    this.logger = options.logger ?? getLogger();
    this.source = options.source;
    this.sink = options.sink;
  }

  head(address: string, handler: Handler): this {
    return this.route('HEAD', address, handler);
  }

  get(address: string, handler: Handler): this {
    return this.route('GET', address, handler);
  }

  post(address: string, handler: Handler): this {
    return this.route('POST', address, handler);
  }

  put(address: string, handler: Handler): this {
    return this.route('PUT', address, handler);
  }

  patch(address: string, handler: Handler): this {
    return this.route('PATCH', address, handler);
  }

  delete(address: string, handler: Handler): this {
    return this.route('DELETE', address, handler);
  }

  /**
   * Register a route for any method. Malformed patterns throw here.
   */
  route(method: string, address: string, handler: Handler): this {
    this.router.addRoute(method, address, handler);
    this.logger.debug('Route registered', { method: method.toUpperCase(), address });
    return this;
  }

  /**
   * Registered routes, sorted for introspection
   */
  routes(): RouteSummary[] {
    return this.router.list();
  }

  getRouter(): Router {
    return this.router;
  }

  getConfig(): Config {
    return this.config;
  }

  getLogger(): Logger {
    return this.logger;
  }

  /**
   * Handle one request. Missing arguments come from the configured
   * request source and response sink.
   */
  async start(request?: SpurRequest, response?: SpurResponse): Promise<void> {
    const res = response ?? new SpurResponse(this.requireSink());

    if (request) {
      await this.dispatch(() => Promise.resolve(request), res);
      return;
    }

    const source = this.requireSource();
    await this.dispatch(() => this.readRequest(source), res);
  }

  /**
   * Handle one request delivered by a host transport
   */
  async serve(source: RequestSource, sink: ResponseSink): Promise<void> {
    await this.dispatch(() => this.readRequest(source), new SpurResponse(sink));
  }

  /**
   * Start the HTTP server
   */
  async listen(options: Partial<ServerOptions> = {}): Promise<ListenAddress> {
    if (this.server) {
      throw new Error('Application is already listening');
    }

    this.server = new Server((source, sink) => this.serve(source, sink), {
      port: options.port ?? this.config.get('port'),
      hostname: options.hostname ?? this.config.get('host'),
      logger: this.logger,
      onListen: options.onListen ?? (({ hostname, port }) => {
        this.logger.info(`Server listening on http://${hostname}:${port}`);
      }),
    });

    return await this.server.listen();
  }

  /**
   * Stop the HTTP server
   */
  async stop(): Promise<void> {
    if (this.server) {
      await this.server.close();
      this.server = null;
      this.logger.info('Application stopped');
    }
  }

  private async readRequest(source: RequestSource): Promise<SpurRequest> {
    const raw = await source.read();
    return SpurRequest.from(raw, this.parsers, { basePath: this.config.get('basePath') });
  }

  private async dispatch(
    readRequest: () => Promise<SpurRequest>,
    response: SpurResponse
  ): Promise<void> {
    let request: SpurRequest;
    try {
      request = await readRequest();
    } catch (error) {
      this.fail(response, toHttpException(error), this.logger);
      return;
    }

    await this.handleRequest(request, response);
  }

  private async handleRequest(request: SpurRequest, response: SpurResponse): Promise<void> {
    const log = createRequestLogger(this.logger, {
      requestId: randomUUID(),
      method: request.method,
      path: request.uri,
    });
    log.debug('Dispatching request');

    const telemetry = this.config.get('telemetry');
    const outcome = await withSpan(
      `HTTP ${request.method}`,
      async (span) => {
        const result = await this.router.handle(request, response);
        if (!result.ok && result.error.status >= 500) {
          recordSpanException(result.error);
        }
        span.setAttribute(
          'http.response.status_code',
          result.ok ? response.statusCode : result.error.status
        );
        return result;
      },
      {
        kind: SpanKind.SERVER,
        enabled: telemetry.enabled,
        tracerName: telemetry.serviceName,
        parentContext: extractContextFromHeaders(request.headers, telemetry.enabled),
        attributes: {
          'http.request.method': request.method,
          'url.path': request.uri,
        },
      }
    );

    if (!outcome.ok) {
      this.fail(response, outcome.error, log);
      return;
    }

    if (!response.finished) {
      response.end();
    }
    log.debug('Request completed', { status: response.statusCode });
  }

  /**
   * Render a failure as the error envelope on a fresh response
   */
  private fail(response: SpurResponse, error: HttpException, log: Logger): void {
    if (error.status >= 500) {
      log.error('Request failed', error, { status: error.status });
    } else {
      log.warn('Request failed', { status: error.status, message: error.message });
    }

    if (response.finished) {
      log.warn('Response already sent, error envelope dropped', { status: error.status });
      return;
    }

    response
      .fresh()
      .status(error.status)
      .set({ ...error.headers })
      .json(error.toEnvelope())
      .end();
  }

  private requireSource(): RequestSource {
    if (!this.source) {
      throw new Error('No request given and no request source configured');
    }
    return this.source;
  }

  private requireSink(): ResponseSink {
    if (!this.sink) {
      throw new Error('No response given and no response sink configured');
    }
    return this.sink;
  }
}

/**
 * Create a new application instance
 */
export function createApp(options?: ApplicationOptions): Application {
  return new Application(options);
}
