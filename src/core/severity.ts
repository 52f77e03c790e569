/**
 * Attention-band proposal: count signals, then cap by confidence.
 *
 * The two stages stay separate so that the cap holds whatever the counting
 * step turns into. Critical is never proposed; it is reserved for a human
 * escalating a finding.
 */

import type { AttentionBand, Confidence, SeverityProposal, Signal } from '../types.js';

const BAND_ORDER: readonly AttentionBand[] = ['Low', 'Medium', 'High', 'Critical'];
const CONFIDENCE_ORDER: readonly Confidence[] = ['Low', 'Moderate', 'High'];

/** Highest band each aggregate confidence may present */
export const CONFIDENCE_CEILING: Readonly<Record<Confidence, AttentionBand>> = {
  Low: 'Medium',
  Moderate: 'High',
  High: 'Critical',
};

export function bandRank(band: AttentionBand): number {
  return BAND_ORDER.indexOf(band);
}

export function confidenceRank(confidence: Confidence): number {
  return CONFIDENCE_ORDER.indexOf(confidence);
}

/** Maximum individual confidence; a single strong signal lifts the page. */
export function aggregateConfidence(signals: readonly Signal[]): Confidence {
  let best: Confidence = 'Low';
  for (const signal of signals) {
    if (confidenceRank(signal.confidence) > confidenceRank(best)) best = signal.confidence;
  }
  return best;
}

/**
 * Band from signal count alone.
 * Default mode tops out at Medium (3+ signals); strict mode reaches
 * Medium at 2 and High at 4.
 */
export function proposeRawBand(signalCount: number, strict: boolean): AttentionBand {
  if (strict) {
    if (signalCount >= 4) return 'High';
    if (signalCount >= 2) return 'Medium';
    return 'Low';
  }
  return signalCount >= 3 ? 'Medium' : 'Low';
}

export function capBand(band: AttentionBand, confidence: Confidence): AttentionBand {
  const ceiling = CONFIDENCE_CEILING[confidence];
  return bandRank(band) > bandRank(ceiling) ? ceiling : band;
}

export function proposeSeverity(signals: readonly Signal[], strict = false): SeverityProposal {
  if (signals.length === 0) {
    // No evidence is itself a confident observation
    return { band: 'Low', confidence: 'High' };
  }

  const confidence = aggregateConfidence(signals);
  const band = capBand(proposeRawBand(signals.length, strict), confidence);
  return { band, confidence };
}
