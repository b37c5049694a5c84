import { Intent, SentimentLevel } from '../config/types';
import { classifyIntent } from './intent-classifier';
import { Lexicon } from './lexicon';
import { scoreSentiment, smoothSentiment } from './sentiment-analyzer';

export interface Classification {
  intent: Intent;
  confidence: number;
  /** Smoothed against the previous turn */
  sentiment: SentimentLevel;
  rawSentiment: SentimentLevel;
  sentimentScore: number;
}

export class Classifier {
  constructor(private readonly lexicon: Lexicon) {}

  classify(text: string, previousUserTurns: readonly string[], previousSentiment?: SentimentLevel): Classification {
    const intent = classifyIntent(this.lexicon, text, previousUserTurns);
    const sentiment = scoreSentiment(this.lexicon, text);
    return {
      intent: intent.intent,
      confidence: intent.confidence,
      sentiment: smoothSentiment(sentiment.level, previousSentiment),
      rawSentiment: sentiment.level,
      sentimentScore: sentiment.score,
    };
  }
}
