/**
 * router/index.ts - Public API for the routing layer
 */

export { SemanticRouter, DEFAULT_SCORE_THRESHOLD } from "./semantic-router";
export type {
  Aggregation,
  RouteChoice,
  RouteOptions,
  SemanticRouterOptions,
} from "./semantic-router";
export { syncRoutes, computeRoutesHash, canonicalJson, ROUTES_HASH_FIELD } from "./sync";
export type { SyncOptions, SyncResult } from "./sync";
export { loadRoutes, parseRoutes, routeSchema } from "./routes";
export type { Route } from "./routes";
