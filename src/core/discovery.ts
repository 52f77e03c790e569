/**
 * Discovery run: homepage → links → frontier → pooled fetches → brief
 */

import {
  FetchFailureError,
  InvalidConfigurationError,
  type DiscoverOptions,
  type DiscoveryBrief,
  type FetchErrorRecord,
  type FetchResult,
  type Origin,
  type PageRecord,
} from '../types.js';
import { assembleBrief, buildPageRecord } from './brief.js';
import { loadRunDefaults } from './config.js';
import { DEFAULT_DOCTRINE } from './doctrine.js';
import { assertMaxPages, boundTargets } from './frontier.js';
import { fetchPage } from './http-fetch.js';
import { extractLinks, extractVisibleText } from './links.js';
import { canonicalizeUrl, isSameOrigin, normalizeOrigin, originOf } from './normalize.js';
import { mapPool } from './pool.js';
import { fetchRobotsRules, isAllowedByRobots } from './robots.js';

function combineSignals(callerSignal?: AbortSignal, deadlineMs?: number): AbortSignal | undefined {
  const signals: AbortSignal[] = [];
  if (callerSignal) signals.push(callerSignal);
  if (deadlineMs !== undefined) signals.push(AbortSignal.timeout(deadlineMs));
  if (signals.length === 0) return undefined;
  return signals.length === 1 ? signals[0] : AbortSignal.any(signals);
}

/**
 * Discover, classify and score the pages of one website.
 *
 * Input and configuration are validated before any request is made. A
 * failed homepage fetch is the only fetch failure that rejects; every other
 * one is recorded in `fetchErrors`. When the caller's signal or the deadline
 * fires, in-flight fetches are aborted and the brief covers what completed.
 *
 * @example
 * ```typescript
 * import { discover, serializeBrief } from 'trust-radar';
 *
 * const brief = await discover('example.com', { maxPages: 8 });
 * console.log(JSON.stringify(serializeBrief(brief), null, 2));
 * ```
 */
export async function discover(input: string, options: DiscoverOptions = {}): Promise<DiscoveryBrief> {
  const defaults = loadRunDefaults();
  const {
    maxPages = defaults.maxPages,
    strict = false,
    concurrency = defaults.concurrency,
    timeoutMs = defaults.timeoutMs,
    deadlineMs,
    signal: callerSignal,
    respectRobotsTxt = defaults.respectRobotsTxt,
    userAgent = defaults.userAgent,
    doctrine = DEFAULT_DOCTRINE,
  } = options;

  const originUrl = normalizeOrigin(input);
  assertMaxPages(maxPages);
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new InvalidConfigurationError(`concurrency must be a positive integer (got ${concurrency})`);
  }
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new InvalidConfigurationError(`timeoutMs must be positive (got ${timeoutMs})`);
  }
  if (deadlineMs !== undefined && (!Number.isFinite(deadlineMs) || deadlineMs <= 0)) {
    throw new InvalidConfigurationError(`deadlineMs must be positive (got ${deadlineMs})`);
  }

  const signal = combineSignals(callerSignal, deadlineMs);
  const fetchOptions = { timeoutMs, userAgent, signal };

  const home = await fetchPage(originUrl, fetchOptions);
  if (home.error) {
    console.error(`[discover] Homepage fetch failed for ${originUrl}: ${home.error}`);
    throw new FetchFailureError(`Homepage fetch failed: ${home.error}`, home.url, home.status);
  }

  // Identity follows the final URL, not the one typed in
  const origin = originOf(home.finalUrl);
  const homeUrl = canonicalizeUrl(home.finalUrl);

  let links = Array.from(extractLinks(home.body, home.finalUrl));
  if (respectRobotsTxt && maxPages > 1 && links.length > 0) {
    const rules = await fetchRobotsRules(home.finalUrl, { userAgent, signal });
    links = links.filter(link => isAllowedByRobots(link, rules));
  }

  const targets = boundTargets(homeUrl, links, maxPages);
  const fetched = await mapPool(targets.slice(1), concurrency, url => fetchPage(url, fetchOptions), signal);

  const pages: PageRecord[] = [];
  const fetchErrors: FetchErrorRecord[] = [];
  const seen = new Set<string>();

  const record = (result: FetchResult): void => {
    const failure = classifyFailure(result, origin);
    if (failure) {
      fetchErrors.push(failure);
      return;
    }
    const url = canonicalizeUrl(result.finalUrl);
    // Two targets redirecting to one page yield one record
    if (seen.has(url)) return;
    seen.add(url);
    pages.push(buildPageRecord(url, result.body, { strict, doctrine }));
  };

  record(home);
  for (const result of fetched) {
    if (result) record(result);
  }

  const cancelled = fetched.some(result => result === undefined) || (signal?.aborted ?? false);
  if (cancelled) {
    const attempted = fetched.filter(result => result !== undefined).length + 1;
    console.error(`[discover] Run cancelled after ${attempted} of ${targets.length} fetches`);
  }

  return assembleBrief(origin, pages, fetchErrors, {
    homepageText: extractVisibleText(home.body),
    doctrine,
    cancelled,
  });
}

function classifyFailure(result: FetchResult, origin: Origin): FetchErrorRecord | null {
  if (result.error) {
    return { url: result.url, status: result.status, error: result.error };
  }
  if (!isSameOrigin(result.finalUrl, origin)) {
    return { url: result.url, status: result.status, error: `Redirected off-origin to ${result.finalUrl}` };
  }
  return null;
}
