/**
 * Listing limits
 *
 * Owner listings are a single page, newest first, with no cursor.
 */

export const DEFAULT_LIST_LIMIT = 30;
export const MAX_LIST_LIMIT = 100;

/**
 * Clamp a requested limit to [1, MAX_LIST_LIMIT]
 */
export function normalizeListLimit(limit?: number): number {
  if (limit === undefined || !Number.isFinite(limit)) {
    return DEFAULT_LIST_LIMIT;
  }
  return Math.min(Math.max(Math.trunc(limit), 1), MAX_LIST_LIMIT);
}
