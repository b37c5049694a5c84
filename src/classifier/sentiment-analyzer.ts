import { SENTIMENT_LEVELS, SentimentLevel, sentimentRank } from '../config/types';
import { termMatches, termPositions, toTokenText } from '../text/normalize';
import { Lexicon } from './lexicon';

const ANGRY_WEIGHT = 2;
const FRUSTRATED_WEIGHT = 1;
const INTENSIFIER_FACTOR = 1.5;
/** How many tokens before a positive word a negation still applies */
const NEGATION_WINDOW = 2;

export interface SentimentScore {
  level: SentimentLevel;
  score: number;
}

export function levelForScore(score: number): SentimentLevel {
  if (score >= 3) return 'angry';
  if (score >= 1) return 'frustrated';
  if (score <= -1) return 'positive';
  return 'neutral';
}

/**
 * Signed severity: angry cues +2, frustration cues +1, negated positives +1,
 * positives -1. Intensifiers scale a negative reading by 1.5.
 */
export function scoreSentiment(lexicon: Lexicon, text: string): SentimentScore {
  const tokenText = toTokenText(text);
  const { angry, frustrated, positive, negations, intensifiers } = lexicon.sentiment;

  let score = 0;
  for (const term of angry) {
    if (termMatches(term, tokenText)) score += ANGRY_WEIGHT;
  }
  for (const term of frustrated) {
    if (termMatches(term, tokenText)) score += FRUSTRATED_WEIGHT;
  }

  const seen = new Set<number>();
  for (const term of positive) {
    for (const pos of termPositions(term, tokenText)) {
      if (seen.has(pos)) continue;
      seen.add(pos);
      const window = tokenText.tokens.slice(Math.max(0, pos - NEGATION_WINDOW), pos);
      score += window.some((w) => negations.has(w)) ? 1 : -1;
    }
  }

  if (score > 0 && intensifiers.some((t) => termMatches(t, tokenText))) {
    score *= INTENSIFIER_FACTOR;
  }

  return { level: levelForScore(score), score };
}

/**
 * Severity may rise at once but falls at most one level per turn,
 * so one polite line does not wipe out an angry streak.
 */
export function smoothSentiment(raw: SentimentLevel, previous: SentimentLevel | undefined): SentimentLevel {
  if (previous === undefined) return raw;
  const floor = sentimentRank(previous) - 1;
  return sentimentRank(raw) >= floor ? raw : SENTIMENT_LEVELS[floor];
}
