import { PUBLIC_FILES } from '../protocol/edge.js';
import type { VersionRoutingConfig } from '../types/config.js';
import { isActiveVersion, isVersionId } from './versions.js';

/**
 * Check if the URI is a public file (bypasses authentication, not version routing)
 */
export function isPublicFile(uri: string): boolean {
  return PUBLIC_FILES.some((name) => uri === name || uri.endsWith(`/${name}`));
}

/**
 * First path segment after any leading slashes
 */
function firstSegment(uri: string): string {
  return uri.replace(/^\/+/, '').split('/')[0];
}

function isFileRequest(uri: string): boolean {
  const segments = uri.split('/');
  return segments[segments.length - 1].includes('.');
}

function indexFor(version: string): string {
  return `/${version}/index.html`;
}

/**
 * Rewrite a request URI to a concrete versioned asset path.
 *
 * - `/` or empty: default version's index
 * - file request (last segment has a dot): kept when already version-prefixed,
 *   otherwise prefixed with the default version
 * - route with a version prefix: that version's index if active, else the default's
 * - any other route: default version's index
 */
export function rewriteUri(uri: string, config: VersionRoutingConfig): string {
  const { activeVersions, defaultVersion } = config;

  if (uri === '' || uri === '/') {
    return indexFor(defaultVersion);
  }

  if (isFileRequest(uri)) {
    // Asset links are trusted even for versions no longer active
    if (isVersionId(firstSegment(uri))) {
      return uri;
    }
    return `/${defaultVersion}${uri.startsWith('/') ? '' : '/'}${uri}`;
  }

  const segment = firstSegment(uri);
  if (isVersionId(segment)) {
    const requested = segment.toLowerCase();
    return isActiveVersion(requested, activeVersions) ? indexFor(requested) : indexFor(defaultVersion);
  }

  return indexFor(defaultVersion);
}
