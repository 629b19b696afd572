import { PexelsError } from './errors.js';

export const PEXELS_API = 'https://api.pexels.com';
export const PEXELS_VERSION = 'v1';
export const PEXELS_VIDEO_PATH = 'videos';
export const PEXELS_COLLECTIONS_PATH = 'collections';

export type QueryValue = string | number | undefined;

/**
 * Joins `path` onto `baseUrl` and appends the defined entries of `query` in
 * their insertion order. Values are form-encoded by `URLSearchParams`.
 */
export function buildUrl(baseUrl: string, path: readonly (string | number)[], query: [string, QueryValue][] = []): string {
  const base = baseUrl.replace(/\/+$/, '');
  const segments = path.map((segment) => encodeURIComponent(String(segment)));

  let url: URL;
  try {
    url = new URL(`${base}/${segments.join('/')}`);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw PexelsError.urlParse(message);
  }

  for (const [key, value] of query) {
    if (value === undefined || value === '') {
      continue;
    }
    url.searchParams.append(key, String(value));
  }

  return url.toString();
}
