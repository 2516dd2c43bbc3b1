/**
 * Routing Layer
 *
 * Maps incoming request paths to handlers.
 *
 * Responsibilities:
 * - Compile route patterns into anchored matchers
 * - Extract named path variables
 * - Pick the first matching route in registration order
 * - List routes for introspection
 */

export { RouteAddress } from './address.ts';
export { Route } from './route.ts';
export { Router, NOT_FOUND_BODY, type RouteSummary } from './router.ts';
