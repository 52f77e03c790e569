/**
 * Origin normalization and URL canonicalization
 */

import { InvalidInputError, type Origin } from '../types.js';

/**
 * Turn a user-supplied string into an absolute origin URL.
 * Adds `https://` when no scheme is present. Performs no network access.
 *
 * @example
 * normalizeOrigin('  example.com ') // 'https://example.com/'
 */
export function normalizeOrigin(raw: string): string {
  const trimmed = raw.trim();
  if (!trimmed) {
    throw new InvalidInputError('Origin URL is empty');
  }

  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;

  let url: URL;
  try {
    url = new URL(withScheme);
  } catch {
    throw new InvalidInputError(`Invalid URL: ${trimmed}`);
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new InvalidInputError(`Unsupported scheme "${url.protocol}" (only http and https)`);
  }
  if (!url.hostname) {
    throw new InvalidInputError(`URL has no host: ${trimmed}`);
  }

  return url.href;
}

/**
 * Canonical identity of a page: scheme + host + path, without query,
 * fragment or trailing slash. The site root becomes `scheme://host`.
 */
export function canonicalizeUrl(input: string | URL): string {
  const url = new URL(input.toString());
  url.search = '';
  url.hash = '';
  const path = url.pathname.replace(/\/+$/, '');
  return `${url.protocol}//${url.host}${path}`;
}

export function originOf(input: string | URL): Origin {
  const url = new URL(input.toString());
  return {
    scheme: url.protocol.replace(/:$/, ''),
    host: url.hostname.toLowerCase(),
  };
}

/** Host equality only; a scheme mismatch alone does not make a URL foreign. */
export function isSameOrigin(input: string, origin: Origin): boolean {
  try {
    return new URL(input).hostname.toLowerCase() === origin.host;
  } catch {
    return false;
  }
}

export function formatOrigin(origin: Origin): string {
  return `${origin.scheme}://${origin.host}`;
}
