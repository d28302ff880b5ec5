/**
 * Matches a leading URL scheme such as `https:`
 */
const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:/i;

/**
 * Origin used to resolve relative bases, stripped again from the result
 */
const PLACEHOLDER_ORIGIN = 'http://relative.invalid';

/**
 * Check whether a URL carries its own scheme
 */
export function isAbsoluteUrl(url: string): boolean {
  return SCHEME_PATTERN.test(url);
}

/**
 * Join a base URL and a path using hierarchical URL resolution.
 *
 * The path is resolved relative to the base, so a base without a trailing
 * slash loses its last segment, an absolute path (`/x`) keeps only the
 * origin of the base, and an absolute URL replaces the base entirely.
 *
 * @example
 * ```typescript
 * urlJoin('https://svc/', 'Products');        // 'https://svc/Products'
 * urlJoin('https://svc/odata/', 'Products');  // 'https://svc/odata/Products'
 * urlJoin('https://svc/', 'https://other/X'); // 'https://other/X'
 * ```
 */
export function urlJoin(base: string, path: string): string {
  if (!base) return path;
  if (!path) return base;
  if (isAbsoluteUrl(path)) return path;

  if (isAbsoluteUrl(base)) {
    return new URL(path, base).toString();
  }

  // Relative base: resolve against a placeholder origin and strip it again
  const rootedBase = base.startsWith('/') ? base : `/${base}`;
  const resolved = new URL(path, new URL(rootedBase, PLACEHOLDER_ORIGIN));
  const joined = `${resolved.pathname}${resolved.search}${resolved.hash}`;
  return base.startsWith('/') ? joined : joined.slice(1);
}
