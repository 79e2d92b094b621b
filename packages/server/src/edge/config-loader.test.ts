import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { AwsCredentials, GetParametersResponse } from '@lit-up/shared';

// Mock the parameter store client
vi.mock('./ssm-client.js', () => ({
  getParameters: vi.fn(),
}));

import { getParameters } from './ssm-client.js';
import { ConfigLoader } from './config-loader.js';
import { MemoryConfigCache } from './config-cache.js';
import { ConfigUnavailableError } from './errors.js';

const parameterNames = {
  authUsername: '/lit-up/dev/auth-username',
  authPassword: '/lit-up/dev/auth-password',
  activeVersions: '/lit-up/dev/active-versions',
};

const credentials: AwsCredentials = { accessKeyId: 'AKIDEXAMPLE', secretAccessKey: 'test-secret' };

const T0 = 1_700_000_000_000;

function ssmResponse(activeVersions?: string): GetParametersResponse {
  const parameters = [
    { Name: parameterNames.authUsername, Value: 'test-user' },
    { Name: parameterNames.authPassword, Value: 'test-secret' },
  ];
  if (activeVersions !== undefined) {
    parameters.push({ Name: parameterNames.activeVersions, Value: activeVersions });
  }
  return { Parameters: parameters, InvalidParameters: [] };
}

describe('ConfigLoader', () => {
  let clock: number;
  let creds: AwsCredentials | null;

  function createLoader(): ConfigLoader {
    return new ConfigLoader({
      parameterNames,
      region: 'us-east-1',
      cache: new MemoryConfigCache(),
      credentials: () => creds,
      now: () => clock,
    });
  }

  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    clock = T0;
    creds = credentials;
  });

  describe('loadConfig', () => {
    it('should fetch the three parameters with the credentials and current time', async () => {
      vi.mocked(getParameters).mockResolvedValue(ssmResponse('v2,v5'));

      await createLoader().loadConfig();

      expect(getParameters).toHaveBeenCalledWith(
        ['/lit-up/dev/auth-username', '/lit-up/dev/auth-password', '/lit-up/dev/active-versions'],
        { credentials, region: 'us-east-1', now: new Date(T0) }
      );
    });

    it('should build the configuration from the response', async () => {
      vi.mocked(getParameters).mockResolvedValue(ssmResponse(' v2 , v5 '));

      const config = await createLoader().loadConfig();

      expect(config).toEqual({
        authUsername: 'test-user',
        authPassword: 'test-secret',
        authChallengeValue: 'Basic dGVzdC11c2VyOnRlc3Qtc2VjcmV0',
        activeVersions: ['v2', 'v5'],
        defaultVersion: 'v2',
        fetchedAtEpochMs: T0,
      });
    });

    it.each(['', ','])('should fall back to v1 when active versions is %j', async (value) => {
      vi.mocked(getParameters).mockResolvedValue(ssmResponse(value));

      const config = await createLoader().loadConfig();

      expect(config.activeVersions).toEqual(['v1']);
      expect(config.defaultVersion).toBe('v1');
    });

    it('should fall back to v1 when the active versions parameter is missing', async () => {
      vi.mocked(getParameters).mockResolvedValue(ssmResponse());

      const config = await createLoader().loadConfig();

      expect(config.activeVersions).toEqual(['v1']);
    });
  });

  describe('caching', () => {
    it('should reuse the configuration before the TTL elapses', async () => {
      vi.mocked(getParameters).mockResolvedValue(ssmResponse('v2'));
      const loader = createLoader();

      const first = await loader.loadConfig();
      clock = T0 + 59_999;
      const second = await loader.loadConfig();

      expect(getParameters).toHaveBeenCalledTimes(1);
      expect(second).toBe(first);
    });

    it('should fetch exactly once more when the TTL has elapsed', async () => {
      vi.mocked(getParameters).mockResolvedValue(ssmResponse('v2'));
      const loader = createLoader();

      await loader.loadConfig();
      clock = T0 + 60_000;
      const refreshed = await loader.loadConfig();
      await loader.loadConfig();

      expect(getParameters).toHaveBeenCalledTimes(2);
      expect(refreshed.fetchedAtEpochMs).toBe(T0 + 60_000);
    });

    it('should pick up new active versions after a refresh', async () => {
      vi.mocked(getParameters).mockResolvedValueOnce(ssmResponse('v1')).mockResolvedValueOnce(ssmResponse('v3,v1'));
      const loader = createLoader();

      await loader.loadConfig();
      clock = T0 + 120_000;
      const config = await loader.loadConfig();

      expect(config.defaultVersion).toBe('v3');
    });

    it('should not serialize concurrent cold loads', async () => {
      vi.mocked(getParameters).mockResolvedValue(ssmResponse('v2'));
      const loader = createLoader();

      const [a, b] = await Promise.all([loader.loadConfig(), loader.loadConfig()]);

      expect(getParameters).toHaveBeenCalledTimes(2);
      expect(a).toEqual(b);
    });
  });

  describe('failures', () => {
    it('should fail fast without credentials', async () => {
      creds = null;

      await expect(createLoader().loadConfig()).rejects.toThrow('Missing AWS credentials in environment');
      expect(getParameters).not.toHaveBeenCalled();
    });

    it('should report invalid parameter names when auth parameters are missing', async () => {
      vi.mocked(getParameters).mockResolvedValue({
        Parameters: [{ Name: parameterNames.authUsername, Value: 'test-user' }],
        InvalidParameters: ['/lit-up/dev/auth-password'],
      });

      const error = await createLoader()
        .loadConfig()
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigUnavailableError);
      if (!(error instanceof ConfigUnavailableError)) return;
      expect(error.invalidParameters).toEqual(['/lit-up/dev/auth-password']);
      expect(error.message).toBe(
        'Missing auth parameters. invalid=/lit-up/dev/auth-password ' +
          'userParam=/lit-up/dev/auth-username passParam=/lit-up/dev/auth-password'
      );
    });

    it('should treat an empty password as missing', async () => {
      vi.mocked(getParameters).mockResolvedValue({
        Parameters: [
          { Name: parameterNames.authUsername, Value: 'test-user' },
          { Name: parameterNames.authPassword, Value: '' },
        ],
      });

      await expect(createLoader().loadConfig()).rejects.toBeInstanceOf(ConfigUnavailableError);
    });

    it('should wrap network errors', async () => {
      const cause = new TypeError('fetch failed');
      vi.mocked(getParameters).mockRejectedValue(cause);

      const error = await createLoader()
        .loadConfig()
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigUnavailableError);
      if (!(error instanceof ConfigUnavailableError)) return;
      expect(error.message).toBe('Parameter store request failed: fetch failed');
      expect(error.cause).toBe(cause);
    });

    it('should pass client errors through unchanged', async () => {
      const clientError = new ConfigUnavailableError('HTTP 500 from ssm.us-east-1.amazonaws.com/. Body=');
      vi.mocked(getParameters).mockRejectedValue(clientError);

      await expect(createLoader().loadConfig()).rejects.toBe(clientError);
    });

    it('should not cache failures', async () => {
      vi.mocked(getParameters)
        .mockRejectedValueOnce(new TypeError('fetch failed'))
        .mockResolvedValueOnce(ssmResponse('v2'));
      const loader = createLoader();

      await expect(loader.loadConfig()).rejects.toBeInstanceOf(ConfigUnavailableError);
      const config = await loader.loadConfig();

      expect(getParameters).toHaveBeenCalledTimes(2);
      expect(config.defaultVersion).toBe('v2');
    });

    it('should not serve a stale configuration when the refresh fails', async () => {
      vi.mocked(getParameters)
        .mockResolvedValueOnce(ssmResponse('v2'))
        .mockRejectedValueOnce(new TypeError('fetch failed'));
      const loader = createLoader();

      await loader.loadConfig();
      clock = T0 + 60_000;

      await expect(loader.loadConfig()).rejects.toBeInstanceOf(ConfigUnavailableError);
    });
  });
});
