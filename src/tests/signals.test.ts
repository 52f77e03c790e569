/**
 * Tests for the rule-table signal detector
 */

import { describe, it, expect } from 'vitest';
import { detectSignals, DEFAULT_SIGNAL_RULES, type SignalRule } from '../core/signals.js';

const ids = (html: string) => detectSignals(html).map(s => s.id);

describe('detectSignals', () => {
  it('detects beta language and multiple h1 elements', () => {
    const signals = detectSignals('<h1>A</h1><h1>B</h1><p>Our beta program</p>');

    expect(signals.map(s => s.id)).toEqual(['beta-language', 'multiple-h1']);
    expect(signals.map(s => s.confidence)).toEqual(['Moderate', 'High']);
    expect(signals.map(s => s.evidenceType)).toEqual(['Direct Observation', 'Direct Observation']);
  });

  it('returns no signals for plain markup', () => {
    expect(detectSignals('<html><body><h1>Welcome</h1><p>Hello.</p></body></html>')).toEqual([]);
  });

  it('emits each rule at most once', () => {
    expect(ids('<p>beta</p><p>preview</p><p>experimental</p>')).toEqual(['beta-language']);
  });

  it('keeps table order regardless of where matches appear', () => {
    const html = '<p>Contact support</p><p>See our privacy policy</p><h1>x</h1><h1>y</h1><p>Early access</p>';
    expect(ids(html)).toEqual(['beta-language', 'multiple-h1', 'policy-references', 'support-escalation']);
  });

  it('matches word boundaries only', () => {
    expect(ids('<p>alphabetarium</p>')).toEqual([]);
  });

  it('detects absolute marketing claims', () => {
    expect(ids('<p>Risk-free for 30 days</p>')).toEqual(['absolute-claims']);
    expect(ids('<p>100% satisfaction</p>')).toEqual(['absolute-claims']);
    expect(ids('<p>Rated #1 by users</p>')).toEqual(['absolute-claims']);
  });

  it('does not treat CSS percentages as claims', () => {
    expect(ids('<div style="width:100%">x</div>')).toEqual([]);
  });

  it('does not treat in-page #1 anchors as claims', () => {
    expect(ids('<a href="#1">Slide 1</a><div id="slide-#1">x</div>')).toEqual([]);
    expect(ids('<a href="#1">Go</a> #1')).toEqual([]);
  });

  it('detects #1 in claim context', () => {
    expect(ids('<p>The #1 choice for small teams</p>')).toEqual(['absolute-claims']);
    expect(ids('<p>Voted #1 in customer care</p>')).toEqual(['absolute-claims']);
  });

  it('counts h1 tags with attributes and ignores other heading levels', () => {
    expect(ids('<h1 class="a">A</h1><h1>B</h1>')).toEqual(['multiple-h1']);
    expect(ids('<h1>A</h1><h2>B</h2>')).toEqual([]);
  });

  it('is deterministic', () => {
    const html = '<h1>A</h1><h1>B</h1><p>guaranteed, live chat, terms of service</p>';
    expect(detectSignals(html)).toEqual(detectSignals(html));
  });

  it('accepts a custom rule table', () => {
    const rules: SignalRule[] = [
      {
        id: 'form',
        matches: html => html.includes('<form'),
        description: 'Form present',
        evidenceType: 'Direct Observation',
        rationale: 'Forms collect user data.',
        confidence: 'High',
      },
    ];
    expect(detectSignals('<form></form><p>beta</p>', rules).map(s => s.id)).toEqual(['form']);
  });

  it('ships five rules with fixed ids', () => {
    expect(DEFAULT_SIGNAL_RULES.map(r => r.id)).toEqual([
      'beta-language',
      'absolute-claims',
      'multiple-h1',
      'policy-references',
      'support-escalation',
    ]);
  });
});
