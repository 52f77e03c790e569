import { describe, it, expect } from 'vitest';
import { classifyTrustDomain } from '../core/trust-domain.js';

describe('classifyTrustDomain', () => {
  it('classifies commercial paths as transaction safety', () => {
    expect(classifyTrustDomain('https://example.com/pricing')).toBe('TransactionSafety');
    expect(classifyTrustDomain('https://example.com/checkout')).toBe('TransactionSafety');
    expect(classifyTrustDomain('https://example.com/account/billing')).toBe('TransactionSafety');
  });

  it('classifies help and legal paths as support reliability', () => {
    expect(classifyTrustDomain('https://example.com/support')).toBe('SupportReliability');
    expect(classifyTrustDomain('https://example.com/legal/privacy')).toBe('SupportReliability');
    expect(classifyTrustDomain('https://example.com/FAQ')).toBe('SupportReliability');
  });

  it('lets support terms win when both kinds match', () => {
    expect(classifyTrustDomain('https://example.com/billing-help')).toBe('SupportReliability');
    expect(classifyTrustDomain('https://example.com/refund-policy')).toBe('SupportReliability');
  });

  it('defaults to brand credibility', () => {
    expect(classifyTrustDomain('https://example.com')).toBe('BrandCredibility');
    expect(classifyTrustDomain('https://example.com/about')).toBe('BrandCredibility');
    expect(classifyTrustDomain('https://example.com/blog/launch')).toBe('BrandCredibility');
  });

  it('looks only at the path, not the host or query', () => {
    expect(classifyTrustDomain('https://support.example.com/about')).toBe('BrandCredibility');
    expect(classifyTrustDomain('https://example.com/team?ref=pricing')).toBe('BrandCredibility');
  });

  it('classifies bare paths', () => {
    expect(classifyTrustDomain('/cart')).toBe('TransactionSafety');
  });
});
