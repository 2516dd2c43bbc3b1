/**
 * API Routes
 *
 * JSON endpoints for introspection and request echoing.
 */

import type { Application } from '../../framework/mod.ts';

export function registerApiRoutes(app: Application): void {
  app.get('/sitemap.json', (_req, res) => {
    res.status(200).json(app.routes()).end();
  });

  app.post('/echo', (req, res) => {
    res
      .status(200)
      .json({
        headers: req.headers,
        payload: req.body ?? null,
      })
      .end();
  });
}
