/**
 * @fileoverview Snapshot keys
 *
 * A key identifies one file on one backend. Encoding both parts as a JSON
 * pair keeps keys from different backends distinct whatever characters the
 * ids or paths contain.
 */

export type SnapshotKey = `[${string}]`;

export function snapshotKey(backendId: string, normalizedPath: string): SnapshotKey {
  return `[${JSON.stringify(backendId)},${JSON.stringify(normalizedPath)}]`;
}

export interface SnapshotKeyParts {
  backendId: string;
  path: string;
}

/**
 * Split a stored key back into its parts, or null when it is not one.
 */
export function parseSnapshotKey(key: string): SnapshotKeyParts | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(key);
  } catch {
    return null;
  }
  if (!Array.isArray(parsed) || parsed.length !== 2) {
    return null;
  }
  const [backendId, path]: unknown[] = parsed;
  if (typeof backendId !== 'string' || typeof path !== 'string') {
    return null;
  }
  return { backendId, path };
}
