import { Intent } from '../config/types';
import { TokenText, termMatches, toTokenText } from '../text/normalize';
import { Lexicon } from './lexicon';

/** Weight of the current message and of the trailing user turns, newest first */
const HISTORY_WEIGHTS = [0.5, 0.25, 0.125] as const;

/** Raw score at which a clear winner reaches full confidence */
const FULL_CONFIDENCE_SCORE = 2;

export interface IntentScore {
  intent: Intent;
  confidence: number;
  /** Every intent with a non-zero score, highest first */
  scores: ReadonlyArray<{ intent: Intent; score: number }>;
}

function scoreText(lexicon: Lexicon, text: TokenText, weight: number, into: Map<Intent, number>): void {
  for (const { intent, terms } of lexicon.intents) {
    let sum = 0;
    for (const term of terms) {
      if (termMatches(term, text)) sum += term.weight;
    }
    if (sum > 0) into.set(intent, (into.get(intent) ?? 0) + sum * weight);
  }
}

/**
 * Weighted keyword vote over the message and up to three previous user turns.
 * confidence = margin over the runner-up, damped while the winner is weak.
 */
export function classifyIntent(lexicon: Lexicon, text: string, previousUserTurns: readonly string[] = []): IntentScore {
  const totals = new Map<Intent, number>();
  scoreText(lexicon, toTokenText(text), 1, totals);

  const recent = previousUserTurns.slice(-HISTORY_WEIGHTS.length).reverse();
  recent.forEach((turn, i) => scoreText(lexicon, toTokenText(turn), HISTORY_WEIGHTS[i], totals));

  // Map iteration follows insertion order, which follows lexicon order, so
  // a stable sort keeps the declared order for ties.
  const order = lexicon.intents.map((e) => e.intent);
  const scores = [...totals.entries()]
    .map(([intent, score]) => ({ intent, score }))
    .sort((a, b) => b.score - a.score || order.indexOf(a.intent) - order.indexOf(b.intent));

  if (scores.length === 0) {
    return { intent: 'unknown', confidence: 0, scores: [] };
  }

  const best = scores[0].score;
  const runnerUp = scores.length > 1 ? scores[1].score : 0;
  const confidence = ((best - runnerUp) / best) * Math.min(1, best / FULL_CONFIDENCE_SCORE);

  return {
    intent: scores[0].intent,
    confidence: Math.round(confidence * 1000) / 1000,
    scores,
  };
}
