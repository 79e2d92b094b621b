// Types
export type { EdgeConfig, EdgeParameterNames, VersionRoutingConfig } from './types/config.js';
export type { AwsCredentials, SignableRequest, SignedRequestHeaders } from './types/signing.js';
export {
  isGetParametersResponse,
  type GetParametersRequest,
  type GetParametersResponse,
  type StoredParameter,
} from './types/parameters.js';

// Protocol
export {
  EDGE,
  EDGE_PLACEHOLDERS,
  EDGE_PLACEHOLDER_KEYS,
  PUBLIC_FILES,
  type EdgePlaceholderKey,
  type EdgeDeployValues,
} from './protocol/index.js';

// Routing
export { isVersionId, parseActiveVersions, isActiveVersion, isPublicFile, rewriteUri } from './routing/index.js';

// Auth
export { basicChallengeValue } from './auth/basic.js';

// Signing
export {
  SIGNING_ALGORITHM,
  sha256Hex,
  toAmzDate,
  canonicalizeHeaders,
  buildCanonicalRequest,
  deriveSigningKey,
  signRequest,
} from './crypto/sigv4.js';
