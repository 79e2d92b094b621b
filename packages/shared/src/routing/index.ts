export { isVersionId, parseActiveVersions, isActiveVersion } from './versions.js';
export { isPublicFile, rewriteUri } from './rewrite.js';
