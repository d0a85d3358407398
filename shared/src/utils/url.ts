/**
 * Marketplace url helpers
 */

const ITEM_PATH_PATTERN = /^\/(album|track)\/[^/]+\/?$/;

/**
 * True for http(s) urls pointing at an album or track page
 */
export function isItemUrl(value: string): boolean {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    return false;
  }
  return (
    (url.protocol === 'https:' || url.protocol === 'http:') &&
    ITEM_PATH_PATTERN.test(url.pathname)
  );
}

/**
 * Canonical form used to compare item urls: lowercase host, no query, no hash
 * and no trailing slash
 */
export function normalizeItemUrl(value: string): string {
  try {
    const url = new URL(value);
    const pathname = url.pathname.replace(/\/+$/, '');
    return `${url.protocol}//${url.host.toLowerCase()}${pathname}`;
  } catch {
    return value.trim().replace(/\/+$/, '');
  }
}

/**
 * Url used when an item comes back without one
 */
export function fallbackItemUrl(baseUrl: string, itemId: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/album/${itemId}`;
}
