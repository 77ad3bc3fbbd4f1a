/**
 * Header and URL helpers shared by the resource APIs
 */

const ABSOLUTE_URL = /^https?:\/\//i;

/**
 * Look up a header by name, ignoring case. Multi-valued headers yield their
 * first value.
 */
export function getHeader(
  headers: Record<string, string | string[] | undefined>,
  name: string,
): string | undefined {
  const wanted = name.toLowerCase();
  const key = Object.keys(headers).find(
    (candidate) => candidate.toLowerCase() === wanted,
  );
  const value = key === undefined ? undefined : headers[key];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Resolve a path against the root URL; absolute hypermedia links pass through
 */
export function resolveURL(rootURL: string, pathOrURL: string): string {
  if (ABSOLUTE_URL.test(pathOrURL)) {
    return pathOrURL;
  }
  const pathname = pathOrURL.startsWith("/") ? pathOrURL : `/${pathOrURL}`;
  return `${rootURL}${pathname}`;
}

/**
 * Strip `{rootURL}/{collection}/` from a `Location` header, leaving the ID.
 * A location outside that prefix is returned unchanged.
 */
export function idFromLocation(
  location: string,
  rootURL: string,
  collection: string,
): string {
  const prefix = `${rootURL}/${collection}/`;
  return location.startsWith(prefix) ? location.slice(prefix.length) : location;
}

