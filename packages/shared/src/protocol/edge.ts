/**
 * Edge protocol constants
 */
export const EDGE = {
  CONFIG_CACHE_TTL_MS: 60 * 1000, // cache parameter lookups for 60s per edge container
  DEFAULT_VERSION: 'v1',
  DEFAULT_REGION: 'us-east-1',
  SSM_SERVICE: 'ssm',
  SSM_TARGET: 'AmazonSSM.GetParameters',
  SSM_CONTENT_TYPE: 'application/x-amz-json-1.1',
  AUTH_REALM: 'Secure Area',
} as const;

/**
 * Files served without authentication (at the root or under any version prefix)
 */
export const PUBLIC_FILES = ['manifest.json', 'sw.js'] as const;

/**
 * Placeholder literals in the edge bundle, replaced at deploy time.
 * Lambda@Edge has no environment variables, so these are the only way
 * deploy-specific values reach the function.
 */
export const EDGE_PLACEHOLDERS = {
  authUsernameParam: '__SSM_AUTH_USERNAME_PARAM__',
  authPasswordParam: '__SSM_AUTH_PASSWORD_PARAM__',
  activeVersionsParam: '__SSM_ACTIVE_VERSIONS_PARAM__',
  region: '__SSM_REGION__',
} as const;

export type EdgePlaceholderKey = keyof typeof EDGE_PLACEHOLDERS;

/**
 * Values substituted for the edge placeholders
 */
export type EdgeDeployValues = Record<EdgePlaceholderKey, string>;

export const EDGE_PLACEHOLDER_KEYS: readonly EdgePlaceholderKey[] = [
  'authUsernameParam',
  'authPasswordParam',
  'activeVersionsParam',
  'region',
];
