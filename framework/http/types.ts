/**
 * HTTP Type Definitions
 */

import type { HttpException } from './errors.ts';
import type { SpurRequest } from './request.ts';
import type { SpurResponse } from './response.ts';

/**
 * HTTP methods with a dedicated registration helper
 */
export type HttpMethod = 'HEAD' | 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Header mapping with lower-cased keys
 */
export type HeaderMap = Record<string, string>;

/**
 * Path variables captured by a route pattern
 */
export type RouteParams = Record<string, string>;

/**
 * Route handler function
 */
export type Handler = (
  req: SpurRequest,
  res: SpurResponse,
  params: RouteParams
) => Promise<void> | void;

/**
 * Result of running a handler: success, or the failure to render
 */
export type Outcome =
  | { ok: true }
  | { ok: false; error: HttpException };

/**
 * Request data as the host transport delivers it
 */
export interface RawRequest {
  method: string;
  path: string;
  headers: Record<string, string | string[] | undefined>;
  body: string;
}

/**
 * Supplies the inbound request for one call
 */
export interface RequestSource {
  read(): Promise<RawRequest>;
}

/**
 * Everything the transport needs to emit a response
 */
export interface FinalizedResponse {
  status: number;
  headers: HeaderMap;
  body: string | null;
}

/**
 * Receives the finalized response
 */
export interface ResponseSink {
  send(response: FinalizedResponse): void;
}
