/**
 * Traversal frontier: homepage first, then extracted links in a stable order
 */

import { InvalidConfigurationError } from '../types.js';
import { canonicalizeUrl } from './normalize.js';

export function assertMaxPages(maxPages: number): void {
  if (!Number.isInteger(maxPages) || maxPages < 1) {
    throw new InvalidConfigurationError(`maxPages must be a positive integer (got ${maxPages})`);
  }
}

/**
 * Build the ordered, de-duplicated list of pages to visit.
 *
 * The origin's canonical URL is always first. Other links follow in
 * lexicographic order so identical input gives an identical list, and the
 * list is cut at `maxPages`.
 */
export function boundTargets(originUrl: string, links: Iterable<string>, maxPages: number): string[] {
  assertMaxPages(maxPages);

  const home = canonicalizeUrl(originUrl);
  const rest = new Set<string>();
  for (const link of links) {
    const canonical = canonicalizeUrl(link);
    if (canonical !== home) rest.add(canonical);
  }

  const ordered = Array.from(rest).sort();
  return [home, ...ordered].slice(0, maxPages);
}
