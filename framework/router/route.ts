/**
 * Route
 *
 * Binds a method and compiled address to a handler. `handle` is the
 * boundary where anything a handler throws becomes an HttpException.
 */

import { toHttpException } from '../http/errors.ts';
import type { SpurRequest } from '../http/request.ts';
import type { SpurResponse } from '../http/response.ts';
import type { Handler, Outcome, RouteParams } from '../http/types.ts';
import { RouteAddress } from './address.ts';

export class Route {
  readonly method: string;
  readonly address: RouteAddress;
  readonly handler: Handler;

  constructor(method: string, address: string | RouteAddress, handler: Handler) {
    this.method = method.toUpperCase();
    this.address = typeof address === 'string' ? RouteAddress.compile(address) : address;
    this.handler = handler;
  }

  matches(request: SpurRequest): boolean {
    return this.method === request.method && this.address.matches(request.uri);
  }

  extractParams(request: SpurRequest): RouteParams {
    return this.address.extract(request.uri) ?? {};
  }

  async handle(request: SpurRequest, response: SpurResponse): Promise<Outcome> {
    const params = this.extractParams(request);

    try {
      await this.handler(request, response, params);
      return { ok: true };
    } catch (error) {
      return { ok: false, error: toHttpException(error) };
    }
  }
}
