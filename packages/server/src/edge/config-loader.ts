import {
  EDGE,
  basicChallengeValue,
  parseActiveVersions,
  type AwsCredentials,
  type EdgeConfig,
  type EdgeParameterNames,
  type GetParametersResponse,
} from '@lit-up/shared';
import { MemoryConfigCache, type ConfigCache } from './config-cache.js';
import { credentialsFromEnv } from './credentials.js';
import { ConfigUnavailableError } from './errors.js';
import { getParameters } from './ssm-client.js';

/**
 * Anything that can provide a fresh-enough edge configuration
 */
export interface EdgeConfigSource {
  loadConfig(): Promise<EdgeConfig>;
}

export interface ConfigLoaderOptions {
  parameterNames: EdgeParameterNames;
  region: string;
  cache?: ConfigCache;
  credentials?: () => AwsCredentials | null;
  now?: () => number;
  ttlMs?: number;
}

/**
 * Loads the edge configuration from the parameter store and caches it per container.
 *
 * The cache is not shared between edge containers, so concurrent cold starts
 * each fetch once; GetParameters is a read, so duplicates are harmless.
 * Failures are not cached and not retried: the next request fetches again.
 */
export class ConfigLoader implements EdgeConfigSource {
  private readonly parameterNames: EdgeParameterNames;
  private readonly region: string;
  private readonly cache: ConfigCache;
  private readonly credentials: () => AwsCredentials | null;
  private readonly now: () => number;
  private readonly ttlMs: number;

  constructor(options: ConfigLoaderOptions) {
    this.parameterNames = options.parameterNames;
    this.region = options.region;
    this.cache = options.cache ?? new MemoryConfigCache();
    this.credentials = options.credentials ?? (() => credentialsFromEnv());
    this.now = options.now ?? Date.now;
    this.ttlMs = options.ttlMs ?? EDGE.CONFIG_CACHE_TTL_MS;
  }

  async loadConfig(): Promise<EdgeConfig> {
    const now = this.now();
    const cached = this.cache.get();
    if (cached && now - cached.fetchedAtEpochMs < this.ttlMs) {
      return cached;
    }

    const credentials = this.credentials();
    if (!credentials) {
      throw new ConfigUnavailableError('Missing AWS credentials in environment');
    }

    const { authUsername, authPassword, activeVersions } = this.parameterNames;

    let response: GetParametersResponse;
    try {
      response = await getParameters([authUsername, authPassword, activeVersions], {
        credentials,
        region: this.region,
        now: new Date(now),
      });
    } catch (error) {
      if (error instanceof ConfigUnavailableError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigUnavailableError(`Parameter store request failed: ${message}`, { cause: error });
    }

    const params = new Map((response.Parameters ?? []).map((p) => [p.Name, p.Value]));
    const username = params.get(authUsername);
    const password = params.get(authPassword);

    if (!username || !password) {
      const invalidParameters = response.InvalidParameters ?? [];
      throw new ConfigUnavailableError(
        `Missing auth parameters. invalid=${invalidParameters.join(', ')} ` +
          `userParam=${authUsername} passParam=${authPassword}`,
        { invalidParameters }
      );
    }

    const versions = parseActiveVersions(params.get(activeVersions));
    const config: EdgeConfig = {
      authUsername: username,
      authPassword: password,
      authChallengeValue: basicChallengeValue(username, password),
      activeVersions: versions,
      defaultVersion: versions[0],
      fetchedAtEpochMs: now,
    };

    this.cache.set(config);

    console.log('Edge config refreshed:', {
      activeVersions: config.activeVersions,
      defaultVersion: config.defaultVersion,
    });

    return config;
  }
}
