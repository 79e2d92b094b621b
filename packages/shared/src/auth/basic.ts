/**
 * Build the Basic-Auth value an `Authorization` header must equal
 */
export function basicChallengeValue(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`;
}
