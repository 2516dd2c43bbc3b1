/**
 * Application Routes
 *
 * Registration order matters: the first matching route wins.
 */

import type { Application } from '../../framework/app.ts';
import { registerApiRoutes } from './api.ts';
import { registerGreetingRoute, registerHomeRoutes } from './home.ts';

/**
 * Register all application routes
 */
export function registerRoutes(app: Application): void {
  registerHomeRoutes(app);
  registerApiRoutes(app);

  // Catch-all greeting
  registerGreetingRoute(app);
}
