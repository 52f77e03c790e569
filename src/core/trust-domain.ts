/**
 * Trust-domain classification by URL path
 */

import type { TrustDomain } from '../types.js';

const SUPPORT_KEYWORDS = [
  'support', 'help', 'contact', 'faq', 'legal', 'privacy', 'terms', 'policy',
  'refund', 'return', 'cookie', 'accessibility', 'security', 'status',
];

const TRANSACTION_KEYWORDS = [
  'checkout', 'cart', 'billing', 'pricing', 'price', 'payment', 'pay',
  'subscribe', 'subscription', 'plans', 'order', 'purchase', 'invoice',
];

function pathOf(url: string): string {
  try {
    return new URL(url).pathname;
  } catch {
    // Bare paths classify the same way
    return url;
  }
}

/**
 * Map a URL to its trust domain.
 * Support/legal terms win over commercial ones; everything else is
 * brand credibility.
 */
export function classifyTrustDomain(url: string): TrustDomain {
  const path = pathOf(url).toLowerCase();

  if (SUPPORT_KEYWORDS.some(k => path.includes(k))) return 'SupportReliability';
  if (TRANSACTION_KEYWORDS.some(k => path.includes(k))) return 'TransactionSafety';
  return 'BrandCredibility';
}
