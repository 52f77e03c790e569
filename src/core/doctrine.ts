/**
 * Review doctrine: the read-only guidance a brief is assembled under
 */

import type { Doctrine, TrustDomain } from '../types.js';

const REVIEW_PROMPTS: Record<TrustDomain, string> = {
  BrandCredibility:
    'Would a first-time visitor believe what this page claims? Check that marketing language is ' +
    'substantiated and that the page presents a coherent, finished product.',
  TransactionSafety:
    'Could a user commit money or data here without understanding what happens next? Verify pricing, ' +
    'billing terms, and the error paths of the purchase flow.',
  SupportReliability:
    'When something goes wrong, can a user find help and understand their rights? Confirm that support ' +
    'routes, escalation paths, and policy text are current and reachable.',
};

const EVIDENCE_BAR =
  'Signals are indicative only. A finding needs direct observation by a reviewer before it is reported; ' +
  'attention bands order the review, they do not grade defects.';

const SCOPE_EXCLUSIONS = [
  'Legal or regulatory compliance determinations',
  'Behaviour that requires script execution or rendering',
  'Pages outside the scanned origin',
  'Final severity ratings or remediation directives',
];

/** Build a frozen doctrine, optionally overriding parts of the default */
export function createDoctrine(overrides: Partial<Doctrine> = {}): Doctrine {
  return Object.freeze({
    evidenceBar: overrides.evidenceBar ?? EVIDENCE_BAR,
    scopeExclusions: Object.freeze([...(overrides.scopeExclusions ?? SCOPE_EXCLUSIONS)]),
    reviewPrompts: Object.freeze({ ...REVIEW_PROMPTS, ...overrides.reviewPrompts }),
  });
}

export const DEFAULT_DOCTRINE: Doctrine = createDoctrine();

export function reviewPromptFor(domain: TrustDomain, doctrine: Doctrine = DEFAULT_DOCTRINE): string {
  return doctrine.reviewPrompts[domain];
}
