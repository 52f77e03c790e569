/**
 * Single-page HTTP fetching.
 * One request chain per call, manual redirects with address re-validation,
 * and a result value instead of thrown errors.
 */

// Prefer IPv4 when a host advertises AAAA records it cannot route.
import dns from 'dns';
dns.setDefaultResultOrder('ipv4first');

import { fetch as undiciFetch, Agent, type Response } from 'undici';
import { RadarError, type FetchResult } from '../types.js';

export const DEFAULT_TIMEOUT_MS = 10_000;
export const DEFAULT_USER_AGENT = 'TrustRadar/0.4 (site discovery brief)';

const MAX_REDIRECTS = 10;
const MAX_BODY_BYTES = 5 * 1024 * 1024;
const HTML_ROOT_MARKER = /<html[\s>]/i;

// ── HTTP status text fallbacks (HTTP/2 omits reason phrases) ──────────────────

const HTTP_STATUS_TEXT: Record<number, string> = {
  201: 'Created',
  202: 'Accepted',
  204: 'No Content',
  304: 'Not Modified',
  400: 'Bad Request',
  401: 'Unauthorized',
  403: 'Forbidden',
  404: 'Not Found',
  405: 'Method Not Allowed',
  408: 'Request Timeout',
  410: 'Gone',
  429: 'Too Many Requests',
  451: 'Unavailable For Legal Reasons',
  500: 'Internal Server Error',
  502: 'Bad Gateway',
  503: 'Service Unavailable',
  504: 'Gateway Timeout',
};

// ── HTTP connection pool ──────────────────────────────────────────────────────

function createHttpPool(): Agent {
  return new Agent({
    connections: 8,
    keepAliveTimeout: 30_000,
    keepAliveMaxTimeout: 30_000,
  });
}

let httpPool = createHttpPool();

export async function closePool(): Promise<void> {
  const oldPool = httpPool;
  httpPool = createHttpPool();
  await oldPool.close();
}

// ── Public address guard ──────────────────────────────────────────────────────

/**
 * Reject URLs that point at localhost, private, loopback or link-local
 * addresses. Only literal addresses are checked; names are not resolved.
 */
export function validatePublicUrl(urlString: string): void {
  if (urlString.length > 2048) {
    throw new RadarError('URL too long (max 2048 characters)');
  }

  let url: URL;
  try {
    url = new URL(urlString);
  } catch {
    throw new RadarError('Invalid URL format');
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new RadarError('Only HTTP and HTTPS protocols are allowed');
  }

  const hostname = url.hostname.toLowerCase();
  if (!hostname) {
    throw new RadarError('Invalid hostname');
  }

  if (hostname === 'localhost' || hostname.endsWith('.localhost') || hostname === '0.0.0.0') {
    throw new RadarError('Access to localhost is not allowed');
  }

  const octets = parseDottedIPv4(hostname);
  if (octets) {
    validateIPv4Address(octets);
  }

  if (hostname.includes(':')) {
    validateIPv6Address(hostname);
  }
}

function parseDottedIPv4(hostname: string): number[] | null {
  const match = hostname.match(/^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/);
  if (!match) return null;
  const octets = match.slice(1).map(Number);
  return octets.every(o => o >= 0 && o <= 255) ? octets : null;
}

function validateIPv4Address(octets: number[]): void {
  const [a, b] = octets;

  if (a === 127) {
    throw new RadarError('Access to loopback addresses is not allowed');
  }
  if (a === 10 || (a === 172 && b >= 16 && b <= 31) || (a === 192 && b === 168)) {
    throw new RadarError('Access to private IP addresses is not allowed');
  }
  if (a === 169 && b === 254) {
    throw new RadarError('Access to link-local addresses is not allowed');
  }
  if (a === 0) {
    throw new RadarError('Access to "this network" addresses is not allowed');
  }
}

function validateIPv6Address(hostname: string): void {
  const addr = hostname.replace(/^\[|\]$/g, '');

  if (addr === '::1' || addr === '0:0:0:0:0:0:0:1') {
    throw new RadarError('Access to loopback addresses is not allowed');
  }
  if (addr.startsWith('::ffff:')) {
    throw new RadarError('Access to IPv6-mapped IPv4 addresses is not allowed');
  }
  if (addr.startsWith('fc') || addr.startsWith('fd')) {
    throw new RadarError('Access to unique local IPv6 addresses is not allowed');
  }
  if (/^fe[89ab]/.test(addr)) {
    throw new RadarError('Access to link-local IPv6 addresses is not allowed');
  }
}

// ── Redirects and body reading ────────────────────────────────────────────────

export type RedirectOutcome =
  | { response: Response; finalUrl: string }
  | { response: null; finalUrl: string; status: number | null; error: string };

/**
 * Request `url`, following up to ten redirects by hand so that every hop
 * passes `validatePublicUrl`. Resolves with the first non-redirect response
 * or a failure; thrown errors are turned into text by `describe`.
 */
export async function followRedirects(
  url: string,
  init: { headers: Record<string, string>; signal: AbortSignal },
  describe: (error: unknown, currentUrl: string) => string
): Promise<RedirectOutcome> {
  let currentUrl = url;
  const seenUrls = new Set<string>();
  const failure = (status: number | null, error: string): RedirectOutcome => ({
    response: null,
    finalUrl: currentUrl,
    status,
    error,
  });

  try {
    for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
      if (seenUrls.has(currentUrl)) {
        return failure(null, 'Redirect loop detected');
      }
      seenUrls.add(currentUrl);

      // Re-validate on each redirect
      validatePublicUrl(currentUrl);

      const response = await undiciFetch(currentUrl, {
        headers: init.headers,
        signal: init.signal,
        dispatcher: httpPool,
        redirect: 'manual',
      });

      if (response.status >= 300 && response.status < 400) {
        await discardBody(response);
        const location = response.headers.get('location');
        if (!location) {
          return failure(response.status, 'Redirect response missing Location header');
        }
        currentUrl = new URL(location, currentUrl).href;
        continue;
      }

      return { response, finalUrl: currentUrl };
    }

    return failure(null, `Too many redirects (max ${MAX_REDIRECTS})`);
  } catch (error) {
    return failure(null, describe(error, currentUrl));
  }
}

/**
 * Stream the body, counting bytes. Resolves `null` (and cancels the stream)
 * as soon as more than `maxBytes` have arrived.
 */
export async function readBodyCapped(response: Response, maxBytes: number = MAX_BODY_BYTES): Promise<string | null> {
  const reader = response.body?.getReader();
  if (!reader) return '';

  const chunks: Uint8Array[] = [];
  let totalSize = 0;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      totalSize += value.length;
      if (totalSize > maxBytes) {
        await reader.cancel();
        return null;
      }

      chunks.push(value);
    }
  } finally {
    reader.releaseLock();
  }

  const combined = new Uint8Array(totalSize);
  let offset = 0;
  for (const chunk of chunks) {
    combined.set(chunk, offset);
    offset += chunk.length;
  }

  return new TextDecoder().decode(combined);
}

// ── fetchPage ─────────────────────────────────────────────────────────────────

export interface FetchPageOptions {
  /** Whole-request timeout, redirects and body included (default: 10000) */
  timeoutMs?: number;
  userAgent?: string;
  /** Caller cancellation */
  signal?: AbortSignal;
}

/**
 * Fetch one URL and classify the response.
 *
 * The body is returned only for a 200 response that is HTML by content type
 * or by an `<html` root marker, and no larger than 5 MB. Every other outcome
 * resolves with an empty body and an `error` string; this function does not
 * reject.
 */
export async function fetchPage(url: string, options: FetchPageOptions = {}): Promise<FetchResult> {
  const {
    timeoutMs = DEFAULT_TIMEOUT_MS,
    userAgent = DEFAULT_USER_AGENT,
    signal: abortSignal,
  } = options;

  const failure = (finalUrl: string, status: number | null, error: string): FetchResult => ({
    url,
    finalUrl,
    status,
    body: '',
    error,
  });

  if (abortSignal?.aborted) {
    return failure(url, null, 'Request aborted');
  }

  const timeoutController = new AbortController();
  const timer = setTimeout(() => timeoutController.abort(), timeoutMs);
  const signal = abortSignal
    ? AbortSignal.any([timeoutController.signal, abortSignal])
    : timeoutController.signal;

  const headers: Record<string, string> = {
    'User-Agent': userAgent,
    'Accept': 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.5',
    'Accept-Language': 'en-US,en;q=0.9',
  };

  const describe = (error: unknown, currentUrl: string): string =>
    describeFetchError(error, {
      timedOut: timeoutController.signal.aborted,
      aborted: abortSignal?.aborted ?? false,
      timeoutMs,
      hostname: safeHostname(currentUrl),
    });

  let finalUrl = url;

  try {
    const outcome = await followRedirects(url, { headers, signal }, describe);
    finalUrl = outcome.finalUrl;
    if (outcome.response === null) {
      return failure(finalUrl, outcome.status, outcome.error);
    }

    const { response } = outcome;
    if (response.status !== 200) {
      await discardBody(response);
      const statusText = response.statusText || HTTP_STATUS_TEXT[response.status] || 'Unknown Error';
      return failure(finalUrl, response.status, `HTTP ${response.status}: ${statusText}`);
    }

    const declaredLength = Number(response.headers.get('content-length') ?? '0');
    if (declaredLength > MAX_BODY_BYTES) {
      await discardBody(response);
      return failure(finalUrl, 200, `Response too large (${declaredLength} bytes, max ${MAX_BODY_BYTES})`);
    }

    const contentType = response.headers.get('content-type') ?? '';
    const body = await readBodyCapped(response);

    if (body === null) {
      return failure(finalUrl, 200, `Response too large (max ${MAX_BODY_BYTES} bytes)`);
    }
    if (!contentType.toLowerCase().includes('html') && !HTML_ROOT_MARKER.test(body)) {
      return failure(finalUrl, 200, `Non-HTML content: ${contentType || 'no content-type'}`);
    }
    if (!body.trim()) {
      return failure(finalUrl, 200, 'Empty response body');
    }

    return { url, finalUrl, status: 200, body };
  } catch (error) {
    // Body stream aborted or reset mid-read
    return failure(finalUrl, null, describe(error, finalUrl));
  } finally {
    clearTimeout(timer);
  }
}

export async function discardBody(response: Response): Promise<void> {
  if (response.body && !response.bodyUsed) {
    await response.body.cancel();
  }
}

function safeHostname(url: string): string {
  try {
    return new URL(url).hostname;
  } catch {
    return url;
  }
}

interface FailureContext {
  timedOut: boolean;
  aborted: boolean;
  timeoutMs: number;
  hostname: string;
}

function causeText(error: unknown): string {
  if (!(error instanceof Error) || error.cause === undefined) return '';
  const cause = error.cause;
  if (cause instanceof Error) {
    const code = 'code' in cause && typeof cause.code === 'string' ? cause.code : '';
    return `${cause.message} ${code}`.trim();
  }
  return String(cause);
}

/** Translate a thrown fetch error into the message recorded on the result */
export function describeFetchError(error: unknown, ctx: FailureContext): string {
  if (error instanceof RadarError) {
    return error.message;
  }

  if (ctx.aborted && !ctx.timedOut) {
    return 'Request aborted';
  }
  if (ctx.timedOut || (error instanceof Error && error.name === 'AbortError')) {
    return `Request timed out after ${ctx.timeoutMs}ms`;
  }

  const causeMsg = causeText(error);
  if (/certificate|CERT|SSL|TLS/.test(causeMsg)) {
    return `TLS/SSL certificate error for ${ctx.hostname}`;
  }
  if (causeMsg.includes('ENOTFOUND') || causeMsg.includes('getaddrinfo')) {
    return `DNS resolution failed: ${ctx.hostname} not found`;
  }
  if (causeMsg.includes('ECONNREFUSED')) {
    return `Connection refused by ${ctx.hostname}`;
  }
  if (causeMsg.includes('ECONNRESET') || causeMsg.includes('EPIPE')) {
    return `Connection reset by ${ctx.hostname}`;
  }
  if (causeMsg.includes('ETIMEDOUT') || causeMsg.includes('ENETUNREACH')) {
    return `Network unreachable or connection timed out for ${ctx.hostname}`;
  }

  const msg = error instanceof Error ? error.message : 'Unknown error';
  return causeMsg ? `Failed to fetch: ${msg} (${causeMsg})` : `Failed to fetch: ${msg}`;
}
