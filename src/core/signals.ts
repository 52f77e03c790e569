/**
 * Evidence signal detection over raw page markup.
 *
 * Each rule is a data record evaluated in table order. A rule contributes at
 * most one signal per page, and its confidence is fixed: it describes how
 * directly the pattern implies the concern, not how often it appears.
 */

import type { Confidence, EvidenceType, Signal } from '../types.js';

export interface SignalRule {
  id: string;
  /** Returns true when the pattern is present in the raw HTML */
  matches: (html: string) => boolean;
  description: string;
  evidenceType: EvidenceType;
  rationale: string;
  confidence: Confidence;
}

function countMatches(html: string, pattern: RegExp): number {
  const flags = pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`;
  return html.match(new RegExp(pattern.source, flags))?.length ?? 0;
}

export const DEFAULT_SIGNAL_RULES: readonly SignalRule[] = [
  {
    id: 'beta-language',
    matches: html => /\b(beta|preview|early[- ]access|experimental)\b/i.test(html),
    description: 'Beta or preview language present',
    evidenceType: 'Direct Observation',
    rationale: 'Pre-release wording signals that features may change or fail without notice.',
    confidence: 'Moderate',
  },
  {
    id: 'absolute-claims',
    matches: html =>
      /\b(guaranteed?|risk[- ]free|best in the world|unbeatable|world[- ]class|never fails)\b|\b100\s?% (satisfaction|secure|safe|uptime)\b|\b(rated|ranked|voted)\s+#1\b|#1\s+(rated|ranked|choice|in|for)\b/i.test(html),
    description: 'Superlative or guarantee-style marketing claims',
    evidenceType: 'Pattern Consistency',
    rationale: 'Absolute claims set expectations the product may not be able to substantiate.',
    confidence: 'Low',
  },
  {
    id: 'multiple-h1',
    matches: html => countMatches(html, /<h1[\s>]/i) >= 2,
    description: 'Multiple top-level headings',
    evidenceType: 'Direct Observation',
    rationale: 'More than one <h1> blurs the primary message of the page and its document outline.',
    confidence: 'High',
  },
  {
    id: 'policy-references',
    matches: html =>
      /\b(privacy policy|terms of (service|use)|cookie policy|refund policy|gdpr|ccpa)\b/i.test(html),
    description: 'Policy or legal references',
    evidenceType: 'Grounded Professional Inference',
    rationale: 'Referenced policies are commitments to users; their accuracy and reachability need review.',
    confidence: 'Low',
  },
  {
    id: 'support-escalation',
    matches: html =>
      /\b(contact support|customer service|help ?desk|escalat\w*|live chat|submit a ticket)\b/i.test(html),
    description: 'Support or escalation language',
    evidenceType: 'Clear User Impact Path',
    rationale: 'Escalation routes are where users land when something has already gone wrong.',
    confidence: 'Moderate',
  },
];

/**
 * Run every rule against the page, in table order.
 * Identical HTML always yields an identical sequence.
 */
export function detectSignals(html: string, rules: readonly SignalRule[] = DEFAULT_SIGNAL_RULES): Signal[] {
  const signals: Signal[] = [];
  for (const rule of rules) {
    if (!rule.matches(html)) continue;
    signals.push({
      id: rule.id,
      description: rule.description,
      evidenceType: rule.evidenceType,
      rationale: rule.rationale,
      confidence: rule.confidence,
    });
  }
  return signals;
}
