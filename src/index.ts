/**
 * Trust Radar - site discovery briefs for human trust & risk review
 *
 * Main library export
 */

export * from './types.js';
export { discover } from './core/discovery.js';
export { normalizeOrigin, canonicalizeUrl, originOf, isSameOrigin, formatOrigin } from './core/normalize.js';
export { fetchPage, closePool, validatePublicUrl, type FetchPageOptions } from './core/http-fetch.js';
export { extractLinks, extractTitle, extractVisibleText } from './core/links.js';
export { boundTargets } from './core/frontier.js';
export { classifyTrustDomain } from './core/trust-domain.js';
export { detectSignals, DEFAULT_SIGNAL_RULES, type SignalRule } from './core/signals.js';
export {
  proposeSeverity,
  proposeRawBand,
  capBand,
  aggregateConfidence,
  CONFIDENCE_CEILING,
} from './core/severity.js';
export {
  assembleBrief,
  buildPageRecord,
  discoveryHealth,
  guessArchetype,
  serializeBrief,
  type BriefContext,
  type PageRecordOptions,
} from './core/brief.js';
export { createDoctrine, DEFAULT_DOCTRINE } from './core/doctrine.js';
export { loadRunDefaults, type RunDefaults } from './core/config.js';
export { fetchRobotsRules, parseRobotsTxt, isAllowedByRobots, type RobotsRules } from './core/robots.js';
