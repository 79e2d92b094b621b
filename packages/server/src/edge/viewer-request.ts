/**
 * Lambda@Edge viewer-request function: Basic authentication and version routing.
 *
 * Loads credentials and active versions from the parameter store (cached per
 * container), challenges unauthenticated viewers, and rewrites the URI to a
 * concrete versioned asset path.
 */

import type { CloudFrontRequest, CloudFrontRequestEvent, CloudFrontResultResponse } from 'aws-lambda';
import { EDGE } from '@lit-up/shared';
import { ConfigLoader, type EdgeConfigSource } from './config-loader.js';
import { ConfigUnavailableError } from './errors.js';
import { routeRequest, serverErrorResponse } from './router.js';

// Configuration injected at deploy time
export const CONFIG = {
  SSM_AUTH_USERNAME_PARAM: '__SSM_AUTH_USERNAME_PARAM__',
  SSM_AUTH_PASSWORD_PARAM: '__SSM_AUTH_PASSWORD_PARAM__',
  SSM_ACTIVE_VERSIONS_PARAM: '__SSM_ACTIVE_VERSIONS_PARAM__',
  SSM_REGION: '__SSM_REGION__',
};

/**
 * Whether a deploy-time value was never injected.
 * Matches the token shape rather than the literal, which injection would rewrite too.
 */
export function isUninjected(value: string): boolean {
  return value === '' || /^__[A-Z_]+__$/.test(value);
}

export function resolveRegion(value: string): string {
  return isUninjected(value) ? EDGE.DEFAULT_REGION : value;
}

let defaultLoader: ConfigLoader | null = null;

function getDefaultLoader(): ConfigLoader {
  if (defaultLoader) {
    return defaultLoader;
  }

  const names = [CONFIG.SSM_AUTH_USERNAME_PARAM, CONFIG.SSM_AUTH_PASSWORD_PARAM, CONFIG.SSM_ACTIVE_VERSIONS_PARAM];
  if (names.some(isUninjected)) {
    throw new ConfigUnavailableError('Edge function deployed without parameter names');
  }

  defaultLoader = new ConfigLoader({
    parameterNames: {
      authUsername: CONFIG.SSM_AUTH_USERNAME_PARAM,
      authPassword: CONFIG.SSM_AUTH_PASSWORD_PARAM,
      activeVersions: CONFIG.SSM_ACTIVE_VERSIONS_PARAM,
    },
    region: resolveRegion(CONFIG.SSM_REGION),
  });
  return defaultLoader;
}

function logFailure(error: unknown): void {
  if (error instanceof ConfigUnavailableError) {
    console.error('Edge config unavailable:', {
      message: error.message,
      invalidParameters: error.invalidParameters,
      cause: error.cause,
    });
    return;
  }
  console.error('Viewer request failed:', error);
}

/**
 * Build a viewer-request handler around a configuration source
 */
export function createViewerRequestHandler(getSource: () => EdgeConfigSource) {
  return async function handler(
    event: CloudFrontRequestEvent
  ): Promise<CloudFrontRequest | CloudFrontResultResponse> {
    try {
      const request = event.Records[0].cf.request;
      const config = await getSource().loadConfig();
      const result = routeRequest(request, config);

      if ('status' in result) {
        console.log('Unauthorized request:', { uri: request.uri });
      } else {
        console.log('request uri: ' + result.uri);
      }
      return result;
    } catch (error) {
      logFailure(error);
      return serverErrorResponse();
    }
  };
}

/**
 * Main handler for Lambda@Edge viewer request
 */
export const handler = createViewerRequestHandler(getDefaultLoader);
