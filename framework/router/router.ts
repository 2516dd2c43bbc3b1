/**
 * URL Router
 *
 * Holds the route table in registration order. The first route whose
 * method and address match a request handles it.
 */

import type { SpurRequest } from '../http/request.ts';
import type { SpurResponse } from '../http/response.ts';
import type { Handler, Outcome } from '../http/types.ts';
import { setRouteAttribute } from '../telemetry/otel.ts';
import { Route } from './route.ts';

export interface RouteSummary {
  address: string;
  method: string;
}

/**
 * Listing precedence; verbs not named here sort after DELETE
 */
const METHOD_ORDER: Record<string, number> = {
  HEAD: 0,
  GET: 1,
  POST: 2,
  PUT: 3,
  PATCH: 4,
  DELETE: 5,
};
const OTHER_METHOD_ORDER = 6;

export const NOT_FOUND_BODY = {
  status: 404,
  error: {
    code: 'not_found',
    message: 'resource not found',
  },
} as const;

const headHandler: Handler = (_req, res) => {
  res.status(200).end();
};

export class Router {
  private readonly routes: Route[] = [];

  /**
   * Register a route. Every non-HEAD route is preceded by its own HEAD
   * sibling answering 200 with an empty body.
   */
  register(route: Route): this {
    if (route.method !== 'HEAD') {
      this.routes.push(new Route('HEAD', route.address, headHandler));
    }

    this.routes.push(route);
    return this;
  }

  /**
   * Compile and register a route
   */
  addRoute(method: string, address: string, handler: Handler): this {
    return this.register(new Route(method, address, handler));
  }

  match(request: SpurRequest): Route | null {
    return this.routes.find((route) => route.matches(request)) ?? null;
  }

  async handle(request: SpurRequest, response: SpurResponse): Promise<Outcome> {
    const route = this.match(request);

    if (!route) {
      response.status(404).json(NOT_FOUND_BODY).end();
      return { ok: true };
    }

    setRouteAttribute(route.address.raw, route.method);
    return await route.handle(request, response);
  }

  /**
   * Registered routes ordered by address, verb precedence, then verb name
   */
  list(): RouteSummary[] {
    return this.routes
      .map((route) => ({ address: route.address.raw, method: route.method }))
      .sort(compareSummaries);
  }

  getRoutes(): Route[] {
    return [...this.routes];
  }
}

function compareSummaries(a: RouteSummary, b: RouteSummary): number {
  return compareStrings(a.address, b.address)
    || methodOrder(a.method) - methodOrder(b.method)
    || compareStrings(a.method, b.method);
}

function methodOrder(method: string): number {
  return METHOD_ORDER[method] ?? OTHER_METHOD_ORDER;
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
