/**
 * Lambda@Edge functions for CloudFront
 *
 * The viewer-request function gates the playlist site behind Basic
 * authentication and routes requests to deployed app versions.
 *
 * Note: Lambda@Edge has specific constraints:
 * - No environment variables (parameter names are injected at deploy time)
 * - No AWS SDK in the bundle (parameter store calls are signed by hand)
 * - Limited execution time (5s for viewer request)
 */

export { handler as viewerRequestHandler, createViewerRequestHandler } from './viewer-request.js';
export { ConfigLoader, type EdgeConfigSource, type ConfigLoaderOptions } from './config-loader.js';
export { MemoryConfigCache, type ConfigCache } from './config-cache.js';
export { ConfigUnavailableError } from './errors.js';
export {
  decideRoute,
  routeRequest,
  unauthorizedResponse,
  serverErrorResponse,
  type RouteDecision,
  type RoutingConfig,
} from './router.js';
