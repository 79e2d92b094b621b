import type { AwsCredentials } from '@lit-up/shared';

/**
 * Read the execution role's credentials from the Lambda environment.
 * Returns null when the access key id or secret key is missing.
 */
export function credentialsFromEnv(env: NodeJS.ProcessEnv = process.env): AwsCredentials | null {
  const accessKeyId = env.AWS_ACCESS_KEY_ID;
  const secretAccessKey = env.AWS_SECRET_ACCESS_KEY;

  if (!accessKeyId || !secretAccessKey) {
    return null;
  }

  return {
    accessKeyId,
    secretAccessKey,
    sessionToken: env.AWS_SESSION_TOKEN || undefined,
  };
}
