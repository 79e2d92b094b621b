/**
 * Parameter store (GetParameters) wire types
 */

export interface GetParametersRequest {
  Names: string[];
  WithDecryption: boolean;
}

export interface StoredParameter {
  Name: string;
  Value: string;
  [key: string]: unknown;
}

export interface GetParametersResponse {
  Parameters?: StoredParameter[];
  InvalidParameters?: string[];
}

/**
 * Type guard for a GetParameters response body
 */
export function isGetParametersResponse(data: unknown): data is GetParametersResponse {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) return false;
  const body = data as Record<string, unknown>;

  if (body.Parameters !== undefined) {
    if (!Array.isArray(body.Parameters)) return false;
    const allValid = body.Parameters.every((param: unknown) => {
      if (typeof param !== 'object' || param === null) return false;
      const entry = param as Record<string, unknown>;
      return typeof entry.Name === 'string' && typeof entry.Value === 'string';
    });
    if (!allValid) return false;
  }

  if (body.InvalidParameters !== undefined) {
    if (!Array.isArray(body.InvalidParameters)) return false;
    if (!body.InvalidParameters.every((name: unknown) => typeof name === 'string')) return false;
  }

  return true;
}
