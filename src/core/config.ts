/**
 * Run defaults from environment variables.
 * Explicit options (CLI flags, request body fields) take precedence.
 */

import { DEFAULT_TIMEOUT_MS, DEFAULT_USER_AGENT } from './http-fetch.js';

export interface RunDefaults {
  maxPages: number;
  concurrency: number;
  timeoutMs: number;
  userAgent: string;
  respectRobotsTxt: boolean;
}

export const BUILTIN_DEFAULTS: Readonly<RunDefaults> = Object.freeze({
  maxPages: 10,
  concurrency: 3,
  timeoutMs: DEFAULT_TIMEOUT_MS,
  userAgent: DEFAULT_USER_AGENT,
  respectRobotsTxt: true,
});

type Env = Record<string, string | undefined>;

function positiveInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

function flag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  const lower = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(lower)) return true;
  if (['0', 'false', 'no', 'off'].includes(lower)) return false;
  return fallback;
}

/**
 * Read `RADAR_MAX_PAGES`, `RADAR_CONCURRENCY`, `RADAR_TIMEOUT_MS`,
 * `RADAR_USER_AGENT` and `RADAR_RESPECT_ROBOTS`. Values that do not parse
 * fall back to the built-in default.
 */
export function loadRunDefaults(env: Env = process.env): RunDefaults {
  return {
    maxPages: positiveInt(env.RADAR_MAX_PAGES, BUILTIN_DEFAULTS.maxPages),
    concurrency: positiveInt(env.RADAR_CONCURRENCY, BUILTIN_DEFAULTS.concurrency),
    timeoutMs: positiveInt(env.RADAR_TIMEOUT_MS, BUILTIN_DEFAULTS.timeoutMs),
    userAgent: env.RADAR_USER_AGENT?.trim() || BUILTIN_DEFAULTS.userAgent,
    respectRobotsTxt: flag(env.RADAR_RESPECT_ROBOTS, BUILTIN_DEFAULTS.respectRobotsTxt),
  };
}
