/**
 * Home Routes
 *
 * Plain-text endpoints: liveness check, greeting, and a root that always fails.
 */

import type { Application, Handler } from '../../framework/mod.ts';

export const ping: Handler = (_req, res) => {
  res.status(200).text('pong!').end();
};

/**
 * Greets whatever follows the leading slash
 */
export const greet: Handler = (_req, res, params) => {
  res.status(200).text(`Helo, ${params.name ?? ''}!`).end();
};

/**
 * Demonstrates the 500 envelope for errors that are not HTTP failures
 */
export const root: Handler = () => {
  throw new Error('foo');
};

export function registerHomeRoutes(app: Application): void {
  app.get('/', root);
  app.get('/ping', ping);
}

/**
 * Must be registered last: `/{name}` matches every path
 */
export function registerGreetingRoute(app: Application): void {
  app.get('/{name}', greet);
}
