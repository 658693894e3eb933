import { createHash } from 'node:crypto';
import { basename } from 'node:path';

const TRACKING_PARAMS = new Set([
  'utm_source',
  'utm_medium',
  'utm_campaign',
  'utm_term',
  'utm_content',
  'gclid',
  'fbclid',
  'mc_eid',
]);

const NON_FETCHABLE_SCHEME = /^(javascript:|mailto:|tel:)/i;

/**
 * Canonical form of `href` resolved against `baseUrl`: fragment dropped,
 * tracking parameters removed, remaining query re-serialized.
 * Returns undefined for references that cannot be fetched over http(s).
 */
export const normalizeUrl = (
  baseUrl: string,
  href: string,
): string | undefined => {
  const trimmed = href.trim();
  if (!trimmed || NON_FETCHABLE_SCHEME.test(trimmed)) {
    return undefined;
  }

  let url: URL;
  try {
    url = new URL(trimmed, baseUrl);
  } catch {
    return undefined;
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return undefined;
  }

  url.hash = '';

  const kept = new URLSearchParams();
  for (const [key, value] of url.searchParams) {
    if (!TRACKING_PARAMS.has(key.toLowerCase())) {
      kept.append(key, value);
    }
  }
  const query = kept.toString();
  url.search = query ? `?${query}` : '';

  return url.toString();
};

export const isAllowedDomain = (
  url: string,
  allowedDomains: readonly string[],
): boolean => {
  if (allowedDomains.length === 0) {
    return true;
  }

  let hostname: string;
  try {
    hostname = new URL(url).hostname.toLowerCase();
  } catch {
    return false;
  }

  return allowedDomains.some((domain) => {
    const candidate = domain.toLowerCase().replace(/^\.+/, '');
    return hostname === candidate || hostname.endsWith(`.${candidate}`);
  });
};

/** scheme + host + port */
export const originOf = (url: string): string => new URL(url).origin;

export const isValidUrl = (url: string): boolean => {
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
};

export const sha1 = (data: string | Uint8Array): string =>
  createHash('sha1').update(data).digest('hex');

export const sanitizeFilename = (name: string, maxLength = 140): string =>
  name.replace(/[^A-Za-z0-9._-]+/g, '_').slice(0, maxLength) || 'file';

export const guessFilename = (
  url: string,
  contentDisposition?: string,
): string => {
  const match = contentDisposition
    ? /filename\*?="?([^";]+)"?/.exec(contentDisposition)
    : null;

  if (match?.[1]) {
    return sanitizeFilename(match[1]);
  }

  let pathname = '';
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = '';
  }

  const name = pathname.endsWith('/') ? '' : basename(pathname);
  return sanitizeFilename(name || 'index.html');
};
