import { EDGE } from '../protocol/edge.js';

const VERSION_PATTERN = /^v\d+$/i;

/**
 * Whether a path segment is a version identifier (`v` followed by digits, any case).
 *
 * Routing applies this in three places with different outcomes: file paths
 * with a version prefix are trusted as-is, while client-side routes are
 * validated against the active versions.
 */
export function isVersionId(segment: string): boolean {
  return VERSION_PATTERN.test(segment);
}

/**
 * Parse a comma-separated active-versions value, keeping source order.
 * Never returns an empty list.
 */
export function parseActiveVersions(csv: string | undefined): string[] {
  const versions = (csv ?? '')
    .split(',')
    .map((v) => v.trim())
    .filter((v) => v.length > 0);

  return versions.length > 0 ? versions : [EDGE.DEFAULT_VERSION];
}

/**
 * Case-insensitive membership check against the active versions
 */
export function isActiveVersion(version: string, activeVersions: readonly string[]): boolean {
  const normalized = version.toLowerCase();
  return activeVersions.some((v) => v.toLowerCase() === normalized);
}
