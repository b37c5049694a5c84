import { Intent } from '../config/types';
import { Lexicon } from '../classifier/lexicon';
import { termMatches, toTokenText } from '../text/normalize';

export const MIN_LEAD_SCORE = 1;
export const MAX_LEAD_SCORE = 5;
/** Bands at or above this count as a high-value phrase */
const HIGH_VALUE_BAND = 3;

export interface LeadInput {
  text: string;
  intent: Intent;
  previousScore: number;
  /** High-value phrases seen earlier in the session */
  highValueHits: number;
  patternHint?: number;
}

export interface LeadScore {
  score: number;
  /** Score this message alone earned */
  computed: number;
  highValueHit: boolean;
  triggers: string[];
}

function clamp(n: number): number {
  return Math.min(MAX_LEAD_SCORE, Math.max(MIN_LEAD_SCORE, n));
}

export class LeadScorer {
  constructor(private readonly lexicon: Lexicon) {}

  /** Monotonic: never returns less than `previousScore` */
  score(input: LeadInput): LeadScore {
    const tokenText = toTokenText(input.text);
    const triggers: string[] = [];
    let computed = this.lexicon.intentFloors[input.intent] ?? MIN_LEAD_SCORE;
    let highValueHit = false;

    for (const band of this.lexicon.leadBands) {
      const hit = band.terms.find((t) => termMatches(t, tokenText));
      if (!hit) continue;
      triggers.push(hit.source);
      computed = Math.max(computed, band.score);
      if (band.score >= HIGH_VALUE_BAND) highValueHit = true;
    }

    if (input.patternHint !== undefined) computed = Math.max(computed, input.patternHint);

    // Repeated buying signals across turns
    if (highValueHit && input.highValueHits >= 1) computed += 1;

    computed = clamp(computed);
    return {
      score: Math.max(clamp(input.previousScore), computed),
      computed,
      highValueHit,
      triggers,
    };
  }
}

/** True when this turn moved the score from below to at/above the threshold */
export function crossedThreshold(previous: number, next: number, threshold: number): boolean {
  return previous < threshold && next >= threshold;
}
