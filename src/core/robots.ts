/**
 * robots.txt rules for User-agent: *
 */

import { DEFAULT_USER_AGENT, discardBody, followRedirects, readBodyCapped } from './http-fetch.js';

export interface RobotsRules {
  disallowedPaths: string[];
}

const ALLOW_ALL: RobotsRules = { disallowedPaths: [] };

// Larger files are ignored
const MAX_ROBOTS_BYTES = 500 * 1024;

/** Parse the `Disallow` lines that apply to every user agent */
export function parseRobotsTxt(text: string): RobotsRules {
  const disallowedPaths: string[] = [];
  let relevantSection = false;

  for (const line of text.split('\n')) {
    const trimmed = line.replace(/#.*$/, '').trim();
    const lower = trimmed.toLowerCase();

    if (lower.startsWith('user-agent:')) {
      relevantSection = trimmed.substring('user-agent:'.length).trim() === '*';
      continue;
    }
    if (!relevantSection) continue;

    if (lower.startsWith('disallow:')) {
      const path = trimmed.substring('disallow:'.length).trim();
      if (path) disallowedPaths.push(path);
    }
  }

  return { disallowedPaths };
}

/**
 * Fetch robots.txt for an origin. Redirects are followed through the same
 * public-address guard as page fetches. Any failure (missing file, timeout,
 * blocked address, oversize file) allows everything.
 */
export async function fetchRobotsRules(
  originUrl: string,
  options: { userAgent?: string; signal?: AbortSignal } = {}
): Promise<RobotsRules> {
  const robotsUrl = new URL('/robots.txt', originUrl).href;
  const timeout = AbortSignal.timeout(5000);
  const signal = options.signal ? AbortSignal.any([timeout, options.signal]) : timeout;
  const describe = (e: unknown): string => (e instanceof Error ? e.message : String(e));

  try {
    const outcome = await followRedirects(
      robotsUrl,
      { headers: { 'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT }, signal },
      describe
    );
    if (outcome.response === null) {
      console.error(`[robots] Could not read ${robotsUrl}: ${outcome.error}`);
      return ALLOW_ALL;
    }

    if (!outcome.response.ok) {
      await discardBody(outcome.response);
      return ALLOW_ALL;
    }

    const text = await readBodyCapped(outcome.response, MAX_ROBOTS_BYTES);
    if (text === null) {
      console.error(`[robots] Ignoring ${robotsUrl}: larger than ${MAX_ROBOTS_BYTES} bytes`);
      return ALLOW_ALL;
    }
    return parseRobotsTxt(text);
  } catch (e) {
    console.error(`[robots] Could not read ${robotsUrl}: ${describe(e)}`);
    return ALLOW_ALL;
  }
}

/** Simple prefix match on the path; wildcards are not interpreted */
export function isAllowedByRobots(url: string, rules: RobotsRules): boolean {
  const path = new URL(url).pathname;
  return !rules.disallowedPaths.some(disallowed => path.startsWith(disallowed));
}
