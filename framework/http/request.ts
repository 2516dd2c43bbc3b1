/**
 * Request Object
 *
 * Normalized, immutable view of one inbound request: upper-cased method,
 * path without query string or trailing slash, lower-cased headers and the
 * decoded body.
 */

import type { BodyParserRegistry } from './parsers.ts';
import type { HeaderMap, RawRequest } from './types.ts';

export interface SpurRequestInit {
  method: string;
  uri: string;
  headers?: Record<string, string>;
  body?: unknown;
}

export interface RequestNormalizeOptions {
  /** Routing prefix removed from the front of the path */
  basePath?: string;
}

export class SpurRequest {
  readonly method: string;
  readonly uri: string;
  readonly headers: Readonly<HeaderMap>;
  readonly body: unknown;

  constructor(init: SpurRequestInit) {
    this.method = init.method.toUpperCase();
    this.uri = init.uri;
    this.headers = Object.freeze(normalizeHeaders(init.headers ?? {}));
    this.body = init.body;
    Object.freeze(this);
  }

  /**
   * Get a header value, case-insensitively
   */
  header(name: string): string | null {
    return this.headers[name.toLowerCase()] ?? null;
  }

  /**
   * Content-Type header
   */
  get contentType(): string | null {
    return this.header('content-type');
  }

  /**
   * Build a request from transport data, decoding the body
   */
  static from(
    raw: RawRequest,
    parsers: BodyParserRegistry,
    options: RequestNormalizeOptions = {}
  ): SpurRequest {
    const headers = normalizeHeaders(raw.headers);

    return new SpurRequest({
      method: raw.method,
      uri: normalizePath(raw.path, options.basePath ?? ''),
      headers,
      body: parsers.resolve(headers, raw.body),
    });
  }
}

/**
 * Lower-case header names; list values are joined, later duplicates win
 */
export function normalizeHeaders(
  headers: Record<string, string | string[] | undefined>
): HeaderMap {
  const normalized: HeaderMap = {};

  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    normalized[key.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }

  return normalized;
}

/**
 * Strip query string, routing prefix and trailing slashes; default to `/`
 */
export function normalizePath(path: string, basePath = ''): string {
  let uri = path.split('?')[0] ?? '';
  uri = uri.split('#')[0] ?? '';

  const prefix = basePath.replace(/\/+$/, '');
  if (prefix.length > 0 && (uri === prefix || uri.startsWith(prefix + '/'))) {
    uri = uri.slice(prefix.length);
  }

  uri = uri.replace(/\/+$/, '');
  return uri.length > 0 ? uri : '/';
}
