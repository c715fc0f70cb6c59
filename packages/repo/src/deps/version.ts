const RANGE_PREFIX = /^[\^~=<>]+/;

/**
 * Strips leading range operators and a leading `v`:
 * `^1.0.0` and `>=v2.1` become `1.0.0` and `2.1`.
 */
export function normalizeVersion(version: string): string {
  let normalized = version.trim().replace(RANGE_PREFIX, '').trim();
  if (normalized.startsWith('v')) {
    normalized = normalized.slice(1);
  }
  return normalized;
}
