import { isPublicFile, parseActiveVersions, rewriteUri } from '@lit-up/shared';

export interface RoutePreview {
  uri: string;
  isPublic: boolean;
  activeVersions: string[];
  defaultVersion: string;
  rewrittenUri: string;
}

/**
 * Show how the edge function routes a URI for a given active-versions value
 * (assuming the viewer is authenticated or the file is public)
 */
export function previewRoute(uri: string, activeVersionsCsv: string): RoutePreview {
  const activeVersions = parseActiveVersions(activeVersionsCsv);
  const defaultVersion = activeVersions[0];

  return {
    uri,
    isPublic: isPublicFile(uri),
    activeVersions,
    defaultVersion,
    rewrittenUri: rewriteUri(uri, { activeVersions, defaultVersion }),
  };
}
