/**
 * Joins a base URL and path segments:
 * - Removing trailing slashes from baseUrl (preserving protocol ://)
 * - Removing leading slashes from path segments
 * - Joining with single /
 * - Normalizing multiple consecutive slashes (except protocol)
 */
export function normalizePath(baseUrl: string, ...paths: string[]): string {
  let normalized = baseUrl.replace(/([^:]\/)\/+$/, '$1');

  for (const path of paths) {
    if (!path) continue;

    const cleanPath = path.replace(/^\/+/, '');
    if (!cleanPath) continue;

    if (normalized && !normalized.endsWith('/')) {
      normalized += '/';
    }
    normalized += cleanPath;
  }

  return normalized.replace(/([^:]\/)\/+/g, '$1');
}
