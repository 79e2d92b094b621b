import type { CloudFrontRequest, CloudFrontResultResponse } from 'aws-lambda';
import { EDGE, isPublicFile, rewriteUri, type EdgeConfig } from '@lit-up/shared';

export type RouteDecision = { kind: 'rewritten'; uri: string } | { kind: 'unauthorized' };

export type RoutingConfig = Pick<EdgeConfig, 'authChallengeValue' | 'activeVersions' | 'defaultVersion'>;

/**
 * Decide whether a request is let through (and where to) or challenged.
 * Public files skip the credential check but are still version-routed.
 */
export function decideRoute(
  uri: string,
  authorization: string | undefined,
  config: RoutingConfig
): RouteDecision {
  if (!isPublicFile(uri) && authorization !== config.authChallengeValue) {
    return { kind: 'unauthorized' };
  }
  return { kind: 'rewritten', uri: rewriteUri(uri, config) };
}

/**
 * First Authorization header value, if any
 */
export function getAuthorization(request: CloudFrontRequest): string | undefined {
  return request.headers['authorization']?.[0]?.value;
}

/**
 * Basic-Auth challenge, triggering the browser's native prompt
 */
export function unauthorizedResponse(): CloudFrontResultResponse {
  return {
    status: '401',
    statusDescription: 'Unauthorized',
    headers: {
      'www-authenticate': [{ key: 'WWW-Authenticate', value: `Basic realm="${EDGE.AUTH_REALM}"` }],
      'cache-control': [{ key: 'Cache-Control', value: 'no-cache' }],
    },
  };
}

/**
 * Generic error page. Details stay in the logs.
 */
export function serverErrorResponse(): CloudFrontResultResponse {
  return {
    status: '500',
    statusDescription: 'Internal Server Error',
    headers: {
      'content-type': [{ key: 'Content-Type', value: 'text/plain' }],
    },
    body: 'Server error',
  };
}

/**
 * Apply the routing decision to a CloudFront request.
 * Returns a rewritten copy of the request or the 401 response; the input is not mutated.
 */
export function routeRequest(
  request: CloudFrontRequest,
  config: RoutingConfig
): CloudFrontRequest | CloudFrontResultResponse {
  const decision = decideRoute(request.uri || '/', getAuthorization(request), config);

  if (decision.kind === 'unauthorized') {
    return unauthorizedResponse();
  }

  return { ...request, uri: decision.uri };
}
