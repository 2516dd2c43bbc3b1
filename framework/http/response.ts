/**
 * Response Builder
 *
 * Fluent interface for building an HTTP response. `end()` hands the result
 * to the transport sink exactly once; the response is frozen afterwards.
 */

import { Buffer } from 'node:buffer';
import { ResponseFinalizedError } from './errors.ts';
import type { FinalizedResponse, HeaderMap, ResponseSink } from './types.ts';

export class SpurResponse {
  private _status = 200;
  private _headers: HeaderMap = {};
  private _body: string | null = null;
  private _finished = false;
  private readonly sink: ResponseSink;

  constructor(sink: ResponseSink) {
    this.sink = sink;
  }

  get statusCode(): number {
    return this._status;
  }

  get headers(): Readonly<HeaderMap> {
    return { ...this._headers };
  }

  get content(): string | null {
    return this._body;
  }

  /**
   * Whether the response was handed to the transport
   */
  get finished(): boolean {
    return this._finished;
  }

  /**
   * Set the response status code
   */
  status(code: number): this {
    this.assertWritable('set status');
    this._status = code;
    return this;
  }

  /**
   * Merge headers into the response
   */
  set(headers: Record<string, string>): this {
    this.assertWritable('set headers');
    for (const [name, value] of Object.entries(headers)) {
      this._headers[name.toLowerCase()] = value;
    }
    return this;
  }

  header(name: string, value: string): this {
    return this.set({ [name]: value });
  }

  body(content: string): this {
    this.assertWritable('set body');
    this._body = content;
    return this;
  }

  /**
   * Serialize a JSON body
   */
  json(data: unknown): this {
    return this
      .set({ 'content-type': 'application/json; charset=utf-8' })
      .body(JSON.stringify(data));
  }

  /**
   * Set a plain text body
   */
  text(content: string): this {
    return this
      .set({ 'content-type': 'text/plain; charset=utf-8' })
      .body(content);
  }

  /**
   * Finalize and hand the response to the transport
   */
  end(): void {
    this.assertWritable('end');
    this._finished = true;
    this.sink.send(this.build());
  }

  /**
   * A new, empty response bound to the same transport
   */
  fresh(): SpurResponse {
    return new SpurResponse(this.sink);
  }

  /**
   * Snapshot of what `end()` sends
   */
  build(): FinalizedResponse {
    const headers = { ...this._headers };

    if (this.isBodyless() || this._body === null || this._body.length === 0) {
      return { status: this._status, headers, body: null };
    }

    headers['content-length'] = String(Buffer.byteLength(this._body, 'utf8'));
    return { status: this._status, headers, body: this._body };
  }

  private isBodyless(): boolean {
    return this._status < 200 || this._status === 204;
  }

  private assertWritable(operation: string): void {
    if (this._finished) {
      throw new ResponseFinalizedError(operation);
    }
  }
}
