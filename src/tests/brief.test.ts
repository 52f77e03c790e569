/**
 * Tests for page records, brief assembly and the serialized brief
 */

import { describe, it, expect } from 'vitest';
import {
  assembleBrief,
  buildPageRecord,
  discoveryHealth,
  guessArchetype,
  serializeBrief,
} from '../core/brief.js';
import { createDoctrine, DEFAULT_DOCTRINE } from '../core/doctrine.js';
import type { FetchErrorRecord, PageRecord } from '../types.js';

const NOW = new Date('2026-01-15T12:00:00.000Z');
const ORIGIN = { scheme: 'https', host: 'example.com' };

describe('buildPageRecord', () => {
  it('classifies, detects and scores a page', () => {
    const page = buildPageRecord(
      'https://example.com/about',
      '<html><head><title>About us</title></head><body><h1>A</h1><h1>B</h1><p>Our beta program</p></body></html>'
    );

    expect(page.url).toBe('https://example.com/about');
    expect(page.title).toBe('About us');
    expect(page.trustDomain).toBe('BrandCredibility');
    expect(page.signals.map(s => s.id)).toEqual(['beta-language', 'multiple-h1']);
    expect(page.attentionBand).toBe('Low');
    expect(page.confidence).toBe('High');
    expect(page.reviewPrompt).toBe(DEFAULT_DOCTRINE.reviewPrompts.BrandCredibility);
  });

  it('raises the band in strict mode', () => {
    const html = '<h1>A</h1><h1>B</h1><p>Our beta program</p>';
    expect(buildPageRecord('https://example.com/about', html, { strict: true }).attentionBand).toBe('Medium');
  });

  it('takes the review prompt from the supplied doctrine', () => {
    const doctrine = createDoctrine({
      reviewPrompts: {
        BrandCredibility: 'brand?',
        TransactionSafety: 'money?',
        SupportReliability: 'help?',
      },
    });
    expect(buildPageRecord('https://example.com/cart', '<p>x</p>', { doctrine }).reviewPrompt).toBe('money?');
  });

  it('returns a frozen record', () => {
    const page = buildPageRecord('https://example.com', '<p>beta</p>');
    expect(Object.isFrozen(page)).toBe(true);
    expect(Object.isFrozen(page.signals)).toBe(true);
    expect(Object.isFrozen(page.signals[0])).toBe(true);
  });
});

describe('discoveryHealth', () => {
  it('maps page counts to health', () => {
    expect([0, 1, 2, 5, 6, 7, 30].map(discoveryHealth)).toEqual([
      'Limited', 'Limited', 'Medium', 'Medium', 'High', 'High', 'High',
    ]);
  });
});

describe('guessArchetype', () => {
  it('recognises medical sites', () => {
    expect(guessArchetype('Book a visit with a doctor at our clinic. Patients welcome.')).toBe('Regulated / Medical');
  });

  it('recognises shops', () => {
    expect(guessArchetype('Add to cart. Free shipping on every order. Summer sale!')).toBe('Commercial / Transactional');
  });

  it('recognises enterprise software', () => {
    expect(guessArchetype('The workflow platform for teams. Request a demo.')).toBe('B2B / Enterprise');
  });

  it('falls back to General', () => {
    expect(guessArchetype('Welcome to my personal homepage')).toBe('General');
    expect(guessArchetype('')).toBe('General');
  });

  it('gives ties to the earlier bucket', () => {
    expect(guessArchetype('clinic shop')).toBe('Regulated / Medical');
  });

  it('matches whole words only', () => {
    expect(guessArchetype('A rapid workshop')).toBe('General');
  });
});

describe('assembleBrief', () => {
  const pages: PageRecord[] = [
    buildPageRecord('https://example.com/support', '<p>help</p>'),
    buildPageRecord('https://example.com', '<p>home</p>'),
    buildPageRecord('https://example.com/pricing', '<p>plans</p>'),
    buildPageRecord('https://example.com/about', '<p>about</p>'),
  ];
  const errors: FetchErrorRecord[] = [
    { url: 'https://example.com/broken', status: 500, error: 'HTTP 500: Internal Server Error' },
  ];

  it('groups pages by trust domain and keeps order within a group', () => {
    const brief = assembleBrief(ORIGIN, pages, errors, { homepageText: '', now: NOW });
    expect(brief.pages.map(p => p.url)).toEqual([
      'https://example.com',
      'https://example.com/about',
      'https://example.com/pricing',
      'https://example.com/support',
    ]);
  });

  it('fills in health, archetype, errors and timestamp', () => {
    const brief = assembleBrief(ORIGIN, pages, errors, { homepageText: 'Add to cart', now: NOW });

    expect(brief.origin).toEqual(ORIGIN);
    expect(brief.discoveryHealth).toBe('Medium');
    expect(brief.archetype).toBe('Commercial / Transactional');
    expect(brief.fetchErrors).toEqual(errors);
    expect(brief.timestamp).toBe('2026-01-15T12:00:00.000Z');
    expect(brief.cancelled).toBe(false);
    expect(brief.doctrine).toBe(DEFAULT_DOCTRINE);
  });

  it('reports High health for seven pages', () => {
    const many = Array.from({ length: 7 }, (_, i) => buildPageRecord(`https://example.com/p${i}`, '<p>x</p>'));
    expect(assembleBrief(ORIGIN, many, [], { homepageText: '', now: NOW }).discoveryHealth).toBe('High');
  });

  it('is frozen', () => {
    const brief = assembleBrief(ORIGIN, pages, errors, { homepageText: '', now: NOW });
    expect(Object.isFrozen(brief)).toBe(true);
    expect(Object.isFrozen(brief.pages)).toBe(true);
    expect(Object.isFrozen(brief.fetchErrors)).toBe(true);
  });
});

describe('serializeBrief', () => {
  it('produces the snake_case wire form', () => {
    const page = buildPageRecord('https://example.com/checkout', '<title>Checkout</title><p>Risk-free</p>');
    const brief = assembleBrief(
      ORIGIN,
      [page],
      [{ url: 'https://example.com/x', status: null, error: 'Request timed out after 10000ms' }],
      { homepageText: '', now: NOW, cancelled: true }
    );

    expect(serializeBrief(brief)).toEqual({
      origin: 'https://example.com',
      discovery_health: 'Limited',
      archetype: 'General',
      pages: [
        {
          url: 'https://example.com/checkout',
          title: 'Checkout',
          trust_domain: 'TransactionSafety',
          signals: [
            {
              id: 'absolute-claims',
              description: 'Superlative or guarantee-style marketing claims',
              evidence_type: 'Pattern Consistency',
              rationale: 'Absolute claims set expectations the product may not be able to substantiate.',
              confidence: 'Low',
            },
          ],
          attention_band: 'Low',
          confidence: 'Low',
          review_prompt: DEFAULT_DOCTRINE.reviewPrompts.TransactionSafety,
        },
      ],
      fetch_errors: [{ url: 'https://example.com/x', status: null, error: 'Request timed out after 10000ms' }],
      timestamp: '2026-01-15T12:00:00.000Z',
      cancelled: true,
      doctrine: {
        evidence_bar: DEFAULT_DOCTRINE.evidenceBar,
        scope_exclusions: [...DEFAULT_DOCTRINE.scopeExclusions],
      },
    });
  });

  it('survives a JSON round trip unchanged', () => {
    const brief = assembleBrief(ORIGIN, [buildPageRecord('https://example.com', '<p>beta</p>')], [], {
      homepageText: '',
      now: NOW,
    });
    const wire = serializeBrief(brief);
    expect(JSON.parse(JSON.stringify(wire))).toEqual(wire);
  });
});

describe('doctrine', () => {
  it('is frozen', () => {
    expect(Object.isFrozen(DEFAULT_DOCTRINE)).toBe(true);
    expect(Object.isFrozen(DEFAULT_DOCTRINE.reviewPrompts)).toBe(true);
    expect(Object.isFrozen(DEFAULT_DOCTRINE.scopeExclusions)).toBe(true);
  });

  it('keeps default prompts that are not overridden', () => {
    const doctrine = createDoctrine({ evidenceBar: 'Observe first.' });
    expect(doctrine.evidenceBar).toBe('Observe first.');
    expect(doctrine.reviewPrompts).toEqual(DEFAULT_DOCTRINE.reviewPrompts);
    expect(doctrine.scopeExclusions).toEqual(DEFAULT_DOCTRINE.scopeExclusions);
  });
});
