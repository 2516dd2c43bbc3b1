/**
 * HTTP Server
 *
 * Wraps node:http with Spur's request source and response sink, so the
 * routing core never touches Node's request or response objects.
 */

import { Buffer } from 'node:buffer';
import {
  createServer,
  type IncomingMessage,
  type Server as NodeHttpServer,
} from 'node:http';
import type { AddressInfo } from 'node:net';
import type { Logger } from '../telemetry/logger.ts';
import type { FinalizedResponse, RawRequest, RequestSource, ResponseSink } from './types.ts';

/**
 * The parts of an IncomingMessage a request source reads
 */
export type InboundMessage =
  & Pick<IncomingMessage, 'method' | 'url' | 'headers'>
  & AsyncIterable<Buffer | string>;

/**
 * The parts of a ServerResponse a response sink writes
 */
export interface OutboundMessage {
  writeHead(statusCode: number, headers: Record<string, string>): unknown;
  end(body?: string): unknown;
}

/**
 * Reads one Node request, buffering the whole body as UTF-8
 */
export class IncomingMessageSource implements RequestSource {
  private readonly message: InboundMessage;

  constructor(message: InboundMessage) {
    this.message = message;
  }

  async read(): Promise<RawRequest> {
    const chunks: Buffer[] = [];

    for await (const chunk of this.message) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }

    return {
      method: this.message.method ?? 'GET',
      path: this.message.url ?? '/',
      headers: this.message.headers,
      body: Buffer.concat(chunks).toString('utf8'),
    };
  }
}

/**
 * Writes a finalized response to a Node response
 */
export class ServerResponseSink implements ResponseSink {
  private readonly target: OutboundMessage;

  constructor(target: OutboundMessage) {
    this.target = target;
  }

  send(response: FinalizedResponse): void {
    this.target.writeHead(response.status, response.headers);
    if (response.body === null) {
      this.target.end();
    } else {
      this.target.end(response.body);
    }
  }
}

export type RequestDispatcher = (source: RequestSource, sink: ResponseSink) => Promise<void>;

export interface ListenAddress {
  hostname: string;
  port: number;
}

export interface ServerOptions {
  port?: number;
  hostname?: string;
  logger?: Logger;
  onListen?: (address: ListenAddress) => void;
}

/**
 * HTTP server for Spur applications
 */
export class Server {
  private readonly dispatch: RequestDispatcher;
  private readonly options: Required<Pick<ServerOptions, 'port' | 'hostname'>> & ServerOptions;
  private server: NodeHttpServer | null = null;

  constructor(dispatch: RequestDispatcher, options: ServerOptions = {}) {
    this.dispatch = dispatch;
    this.options = {
      ...options,
      port: options.port ?? 8000,
      hostname: options.hostname ?? '0.0.0.0',
    };
  }

  get listening(): boolean {
    return this.server?.listening ?? false;
  }

  /**
   * Start listening; resolves with the bound address
   */
  listen(): Promise<ListenAddress> {
    if (this.server) {
      return Promise.reject(new Error('Server is already listening'));
    }

    const server = createServer((req, res) => {
      this.dispatch(new IncomingMessageSource(req), new ServerResponseSink(res)).catch((error: unknown) => {
        const failure = error instanceof Error ? error : new Error(String(error));
        this.options.logger?.error('Request error', failure);
        if (!res.headersSent) {
          res.writeHead(500, { 'content-type': 'text/plain; charset=utf-8' });
        }
        res.end();
      });
    });
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.options.port, this.options.hostname, () => {
        server.off('error', reject);
        const address = boundAddress(server, this.options.hostname, this.options.port);
        this.options.onListen?.(address);
        resolve(address);
      });
    });
  }

  /**
   * Stop accepting connections; resolves once the server is closed
   */
  close(): Promise<void> {
    const server = this.server;
    this.server = null;

    if (!server) {
      return Promise.resolve();
    }

    return new Promise((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }
}

function boundAddress(server: NodeHttpServer, hostname: string, port: number): ListenAddress {
  const address: string | AddressInfo | null = server.address();
  if (address !== null && typeof address === 'object') {
    return { hostname: address.address, port: address.port };
  }
  return { hostname, port };
}
