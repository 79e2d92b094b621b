/**
 * Request signing type definitions
 */

export interface AwsCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
}

/**
 * An HTTP request to be signed. The query string is always empty.
 */
export interface SignableRequest {
  method: string;
  host: string;
  path: string;
  headers: Record<string, string>;
  body: string;
}

export interface SignedRequestHeaders {
  /** YYYYMMDD'T'HHMMSS'Z' */
  amzDate: string;
  authorizationHeader: string;
  securityToken?: string;
}
