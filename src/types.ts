/**
 * Core types for Trust Radar
 */

export type TrustDomain = 'BrandCredibility' | 'TransactionSafety' | 'SupportReliability';

export const TRUST_DOMAINS: readonly TrustDomain[] = [
  'BrandCredibility',
  'TransactionSafety',
  'SupportReliability',
] as const;

export type EvidenceType =
  | 'Direct Observation'
  | 'Pattern Consistency'
  | 'Clear User Impact Path'
  | 'Grounded Professional Inference';

export type Confidence = 'Low' | 'Moderate' | 'High';

export type AttentionBand = 'Low' | 'Medium' | 'High' | 'Critical';

export type DiscoveryHealth = 'High' | 'Medium' | 'Limited';

export type Archetype =
  | 'Regulated / Medical'
  | 'Commercial / Transactional'
  | 'B2B / Enterprise'
  | 'General';

/** Scheme + host pair that bounds same-origin membership */
export interface Origin {
  /** Protocol without the trailing colon, e.g. "https" */
  scheme: string;
  /** Lower-cased hostname (no port) */
  host: string;
}

export interface FetchResult {
  /** URL that was requested */
  url: string;
  /** URL of the last redirect hop; use this for identity decisions */
  finalUrl: string;
  /** HTTP status of the final response, null when no response arrived */
  status: number | null;
  /** HTML body. Empty unless the response was a usable HTML page. */
  body: string;
  /** Why the response is unusable. Absent on success. */
  error?: string;
}

export interface Signal {
  /** Stable identifier of the rule that produced this signal */
  id: string;
  description: string;
  evidenceType: EvidenceType;
  rationale: string;
  confidence: Confidence;
}

export interface PageRecord {
  /** Canonical URL of the page (after redirects) */
  readonly url: string;
  readonly title: string;
  readonly trustDomain: TrustDomain;
  readonly signals: readonly Signal[];
  readonly attentionBand: AttentionBand;
  readonly confidence: Confidence;
  readonly reviewPrompt: string;
}

export interface FetchErrorRecord {
  url: string;
  status: number | null;
  error: string;
}

export interface SeverityProposal {
  band: AttentionBand;
  confidence: Confidence;
}

/** Process-wide review doctrine. Frozen once built. */
export interface Doctrine {
  /** What counts as sufficient evidence for a finding */
  readonly evidenceBar: string;
  /** Topics the brief deliberately does not assess */
  readonly scopeExclusions: readonly string[];
  /** Senior review prompt per trust domain */
  readonly reviewPrompts: Readonly<Record<TrustDomain, string>>;
}

export interface DiscoveryBrief {
  readonly origin: Origin;
  readonly discoveryHealth: DiscoveryHealth;
  readonly archetype: Archetype;
  /** Pages grouped by trust domain, insertion order kept within a domain */
  readonly pages: readonly PageRecord[];
  readonly fetchErrors: readonly FetchErrorRecord[];
  /** ISO 8601 time of assembly */
  readonly timestamp: string;
  /** True when the run was aborted before every target was fetched */
  readonly cancelled: boolean;
  readonly doctrine: Doctrine;
}

export interface DiscoverOptions {
  /** Maximum number of pages to analyse, homepage included (default: 10) */
  maxPages?: number;
  /** Allow escalation up to High when signals accumulate (default: false) */
  strict?: boolean;
  /** Simultaneous fetches after the homepage (default: 3) */
  concurrency?: number;
  /** Per-request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
  /** Abort the whole run after this many milliseconds */
  deadlineMs?: number;
  /** Caller cancellation; aborts in-flight fetches and returns a partial brief */
  signal?: AbortSignal;
  /** Skip links disallowed by robots.txt (default: true) */
  respectRobotsTxt?: boolean;
  /** User-Agent header sent with every request */
  userAgent?: string;
  /** Review doctrine injected into the brief (default: built-in doctrine) */
  doctrine?: Doctrine;
}

/** Serialized form of a DiscoveryBrief, handed to presentation and export layers */
export interface SerializedBrief {
  origin: string;
  discovery_health: DiscoveryHealth;
  archetype: Archetype;
  pages: Array<{
    url: string;
    title: string;
    trust_domain: TrustDomain;
    signals: Array<{
      id: string;
      description: string;
      evidence_type: EvidenceType;
      rationale: string;
      confidence: Confidence;
    }>;
    attention_band: AttentionBand;
    confidence: Confidence;
    review_prompt: string;
  }>;
  fetch_errors: FetchErrorRecord[];
  timestamp: string;
  cancelled: boolean;
  doctrine: {
    evidence_bar: string;
    scope_exclusions: string[];
  };
}

export class RadarError extends Error {
  constructor(message: string, public code?: string) {
    super(message);
    this.name = 'RadarError';
  }
}

/** Empty or unparseable origin. Raised before any network activity. */
export class InvalidInputError extends RadarError {
  constructor(message: string) {
    super(message, 'INVALID_INPUT');
    this.name = 'InvalidInputError';
  }
}

/** Run options out of range, e.g. a non-positive page budget */
export class InvalidConfigurationError extends RadarError {
  constructor(message: string) {
    super(message, 'INVALID_CONFIGURATION');
    this.name = 'InvalidConfigurationError';
  }
}

/** The homepage could not be fetched; nothing to analyse. */
export class FetchFailureError extends RadarError {
  constructor(message: string, public url: string, public status: number | null) {
    super(message, 'FETCH_FAILURE');
    this.name = 'FetchFailureError';
  }
}
