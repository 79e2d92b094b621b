/**
 * Edge configuration type definitions
 */

/**
 * Configuration loaded from the parameter store and cached per edge container
 */
export interface EdgeConfig {
  authUsername: string;
  authPassword: string;
  /** Exact `Authorization` header value a request must carry */
  authChallengeValue: string;
  /** Deployed versions in source order, never empty */
  activeVersions: string[];
  /** activeVersions[0], verbatim */
  defaultVersion: string;
  fetchedAtEpochMs: number;
}

/**
 * The part of the configuration that version routing needs
 */
export type VersionRoutingConfig = Pick<EdgeConfig, 'activeVersions' | 'defaultVersion'>;

/**
 * Names of the parameters holding the edge configuration
 */
export interface EdgeParameterNames {
  authUsername: string;
  authPassword: string;
  activeVersions: string;
}
