import {
  EDGE,
  isGetParametersResponse,
  signRequest,
  type AwsCredentials,
  type GetParametersRequest,
  type GetParametersResponse,
} from '@lit-up/shared';
import { ConfigUnavailableError } from './errors.js';

export interface GetParametersOptions {
  credentials: AwsCredentials;
  region: string;
  now: Date;
}

/**
 * Parameter store endpoint host for a region
 */
export function ssmHost(region: string): string {
  return `ssm.${region}.amazonaws.com`;
}

/**
 * Call parameter store GetParameters (with decryption) over HTTPS, signed with SigV4
 */
export async function getParameters(
  names: string[],
  options: GetParametersOptions
): Promise<GetParametersResponse> {
  const { credentials, region, now } = options;
  const host = ssmHost(region);
  const method = 'POST';
  const path = '/';

  const payload: GetParametersRequest = { Names: names, WithDecryption: true };
  const body = JSON.stringify(payload);

  const baseHeaders: Record<string, string> = {
    'content-type': EDGE.SSM_CONTENT_TYPE,
    'x-amz-target': EDGE.SSM_TARGET,
  };

  const signed = signRequest(
    { method, host, path, headers: baseHeaders, body },
    credentials,
    region,
    EDGE.SSM_SERVICE,
    now
  );

  // host is signed but not set here: fetch derives it from the URL
  const headers: Record<string, string> = {
    ...baseHeaders,
    'x-amz-date': signed.amzDate,
    authorization: signed.authorizationHeader,
  };
  if (signed.securityToken) {
    headers['x-amz-security-token'] = signed.securityToken;
  }

  const response = await fetch(`https://${host}${path}`, { method, headers, body });
  const text = await response.text();

  if (!response.ok) {
    throw new ConfigUnavailableError(`HTTP ${response.status} from ${host}${path}. Body=${text}`);
  }

  // A 2xx body carries decrypted values: report its size, never its text
  let data: unknown;
  try {
    data = JSON.parse(text || '{}');
  } catch {
    throw new ConfigUnavailableError(`Failed to parse JSON response. Length=${text.length}`);
  }

  if (!isGetParametersResponse(data)) {
    throw new ConfigUnavailableError(`Unexpected GetParameters response shape. Length=${text.length}`);
  }

  return data;
}
