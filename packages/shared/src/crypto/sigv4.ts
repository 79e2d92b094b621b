import { createHash, createHmac } from 'crypto';
import type { AwsCredentials, SignableRequest, SignedRequestHeaders } from '../types/signing.js';

/**
 * Signature Version 4 request signing, built on HMAC-SHA256 and SHA-256 only.
 *
 * Lambda@Edge bundles cannot carry the AWS SDK, so the one call the edge
 * function makes (parameter store GetParameters) is signed by hand.
 */

export const SIGNING_ALGORITHM = 'AWS4-HMAC-SHA256';

/**
 * SHA-256 hex digest of a UTF-8 string
 */
export function sha256Hex(data: string): string {
  return createHash('sha256').update(data, 'utf8').digest('hex');
}

function hmac(key: string | Buffer, data: string): Buffer {
  return createHmac('sha256', key).update(data, 'utf8').digest();
}

/**
 * Format a timestamp as YYYYMMDD'T'HHMMSS'Z'
 */
export function toAmzDate(now: Date): string {
  return now.toISOString().replace(/[:-]|\.\d{3}/g, '');
}

/**
 * Lower-case and sort headers into the canonical headers block and signed-headers list
 */
export function canonicalizeHeaders(headers: Record<string, string>): {
  canonicalHeaders: string;
  signedHeaders: string;
} {
  const lowerHeaders = new Map<string, string>();
  for (const [name, value] of Object.entries(headers)) {
    lowerHeaders.set(name.toLowerCase(), String(value).trim());
  }

  const names = [...lowerHeaders.keys()].sort();
  const canonicalHeaders = names.map((name) => `${name}:${lowerHeaders.get(name)}\n`).join('');

  return { canonicalHeaders, signedHeaders: names.join(';') };
}

/**
 * Build the canonical request string
 */
export function buildCanonicalRequest(
  method: string,
  path: string,
  headers: Record<string, string>,
  body: string
): { canonicalRequest: string; signedHeaders: string } {
  const { canonicalHeaders, signedHeaders } = canonicalizeHeaders(headers);
  const canonicalRequest = [
    method,
    path || '/',
    '', // no query parameters
    canonicalHeaders,
    signedHeaders,
    sha256Hex(body),
  ].join('\n');

  return { canonicalRequest, signedHeaders };
}

/**
 * Derive the signing key: secret -> date -> region -> service -> terminator
 */
export function deriveSigningKey(
  secretAccessKey: string,
  dateStamp: string,
  region: string,
  service: string
): Buffer {
  const kDate = hmac(`AWS4${secretAccessKey}`, dateStamp);
  const kRegion = hmac(kDate, region);
  const kService = hmac(kRegion, service);
  return hmac(kService, 'aws4_request');
}

/**
 * Sign a request and return the headers the caller must send with it
 */
export function signRequest(
  request: SignableRequest,
  credentials: AwsCredentials,
  region: string,
  service: string,
  now: Date
): SignedRequestHeaders {
  const amzDate = toAmzDate(now);
  const dateStamp = amzDate.slice(0, 8);

  const headers: Record<string, string> = {
    ...request.headers,
    host: request.host,
    'x-amz-date': amzDate,
  };
  if (credentials.sessionToken) {
    headers['x-amz-security-token'] = credentials.sessionToken;
  }

  const { canonicalRequest, signedHeaders } = buildCanonicalRequest(
    request.method,
    request.path,
    headers,
    request.body
  );

  const credentialScope = `${dateStamp}/${region}/${service}/aws4_request`;
  const stringToSign = [SIGNING_ALGORITHM, amzDate, credentialScope, sha256Hex(canonicalRequest)].join('\n');

  const signingKey = deriveSigningKey(credentials.secretAccessKey, dateStamp, region, service);
  const signature = createHmac('sha256', signingKey).update(stringToSign, 'utf8').digest('hex');

  return {
    amzDate,
    authorizationHeader:
      `${SIGNING_ALGORITHM} Credential=${credentials.accessKeyId}/${credentialScope}, ` +
      `SignedHeaders=${signedHeaders}, Signature=${signature}`,
    securityToken: credentials.sessionToken,
  };
}
