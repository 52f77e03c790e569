/**
 * Page records and discovery brief assembly
 */

import type {
  Archetype,
  DiscoveryBrief,
  DiscoveryHealth,
  Doctrine,
  FetchErrorRecord,
  Origin,
  PageRecord,
  SerializedBrief,
} from '../types.js';
import { TRUST_DOMAINS } from '../types.js';
import { DEFAULT_DOCTRINE, reviewPromptFor } from './doctrine.js';
import { formatOrigin } from './normalize.js';
import { DEFAULT_SIGNAL_RULES, detectSignals, type SignalRule } from './signals.js';
import { proposeSeverity } from './severity.js';
import { classifyTrustDomain } from './trust-domain.js';
import { extractTitle } from './links.js';

export interface PageRecordOptions {
  strict?: boolean;
  doctrine?: Doctrine;
  rules?: readonly SignalRule[];
}

/** Classify, detect and score one fetched page. The record is frozen. */
export function buildPageRecord(url: string, html: string, options: PageRecordOptions = {}): PageRecord {
  const { strict = false, doctrine = DEFAULT_DOCTRINE, rules = DEFAULT_SIGNAL_RULES } = options;

  const trustDomain = classifyTrustDomain(url);
  const signals = detectSignals(html, rules).map(s => Object.freeze(s));
  const { band, confidence } = proposeSeverity(signals, strict);

  return Object.freeze({
    url,
    title: extractTitle(html),
    trustDomain,
    signals: Object.freeze(signals),
    attentionBand: band,
    confidence,
    reviewPrompt: reviewPromptFor(trustDomain, doctrine),
  });
}

/** Visibility from crawl yield alone; independent of what the pages contain */
export function discoveryHealth(fetchedPages: number): DiscoveryHealth {
  if (fetchedPages >= 6) return 'High';
  if (fetchedPages >= 2) return 'Medium';
  return 'Limited';
}

const ARCHETYPE_BUCKETS: ReadonlyArray<{ archetype: Archetype; keywords: string[] }> = [
  {
    archetype: 'Regulated / Medical',
    keywords: [
      'patient', 'patients', 'clinic', 'medical', 'healthcare', 'hipaa', 'pharmacy',
      'prescription', 'clinical', 'doctor', 'diagnosis', 'fda',
    ],
  },
  {
    archetype: 'Commercial / Transactional',
    keywords: [
      'shop', 'cart', 'checkout', 'add to cart', 'buy now', 'free shipping',
      'sale', 'discount', 'order now', 'in stock',
    ],
  },
  {
    archetype: 'B2B / Enterprise',
    keywords: [
      'enterprise', 'saas', 'platform', 'solutions', 'request a demo', 'book a demo',
      'integrations', 'api', 'for teams', 'workflow',
    ],
  },
];

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Advisory guess at what kind of site this is.
 * The bucket with the most distinct keyword hits wins; ties go to the
 * earlier bucket. Never feeds back into scoring.
 */
export function guessArchetype(homepageText: string): Archetype {
  const text = homepageText.toLowerCase();
  let best: Archetype = 'General';
  let bestHits = 0;

  for (const bucket of ARCHETYPE_BUCKETS) {
    const hits = bucket.keywords.filter(k => new RegExp(`\\b${escapeRegex(k)}\\b`).test(text)).length;
    if (hits > bestHits) {
      best = bucket.archetype;
      bestHits = hits;
    }
  }

  return best;
}

export interface BriefContext {
  /** Visible text of the homepage, used for the archetype guess */
  homepageText: string;
  doctrine?: Doctrine;
  cancelled?: boolean;
  /** Assembly time (default: now) */
  now?: Date;
}

export function groupByTrustDomain(pages: readonly PageRecord[]): PageRecord[] {
  return TRUST_DOMAINS.flatMap(domain => pages.filter(p => p.trustDomain === domain));
}

export function assembleBrief(
  origin: Origin,
  pages: readonly PageRecord[],
  fetchErrors: readonly FetchErrorRecord[],
  context: BriefContext
): DiscoveryBrief {
  const { homepageText, doctrine = DEFAULT_DOCTRINE, cancelled = false, now = new Date() } = context;

  return Object.freeze({
    origin: Object.freeze({ ...origin }),
    discoveryHealth: discoveryHealth(pages.length),
    archetype: guessArchetype(homepageText),
    pages: Object.freeze(groupByTrustDomain(pages)),
    fetchErrors: Object.freeze(fetchErrors.map(e => Object.freeze({ ...e }))),
    timestamp: now.toISOString(),
    cancelled,
    doctrine,
  });
}

/** Wire form consumed by presentation and export layers */
export function serializeBrief(brief: DiscoveryBrief): SerializedBrief {
  return {
    origin: formatOrigin(brief.origin),
    discovery_health: brief.discoveryHealth,
    archetype: brief.archetype,
    pages: brief.pages.map(page => ({
      url: page.url,
      title: page.title,
      trust_domain: page.trustDomain,
      signals: page.signals.map(s => ({
        id: s.id,
        description: s.description,
        evidence_type: s.evidenceType,
        rationale: s.rationale,
        confidence: s.confidence,
      })),
      attention_band: page.attentionBand,
      confidence: page.confidence,
      review_prompt: page.reviewPrompt,
    })),
    fetch_errors: brief.fetchErrors.map(e => ({ url: e.url, status: e.status, error: e.error })),
    timestamp: brief.timestamp,
    cancelled: brief.cancelled,
    doctrine: {
      evidence_bar: brief.doctrine.evidenceBar,
      scope_exclusions: [...brief.doctrine.scopeExclusions],
    },
  };
}
