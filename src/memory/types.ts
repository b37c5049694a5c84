import { ConversationState, Intent, SentimentLevel } from '../config/types';

export type FactKey = 'name' | 'email' | 'phone' | 'property' | 'issue_category';

export type KnownFacts = Partial<Record<FactKey, string>>;

/** How many recent sentiment readings a session keeps for streak rules */
export const SENTIMENT_HISTORY_LIMIT = 10;

export interface Session {
  sessionId: string;
  tenantId: string;
  turnCount: number;
  /** 1..5, never decreases until reset */
  leadScore: number;
  knownFacts: KnownFacts;
  /** Sticky until reset */
  escalated: boolean;
  state: ConversationState;
  /** Last smoothed sentiment */
  sentiment?: SentimentLevel;
  /** Smoothed sentiment per turn, oldest first */
  recentSentiment: SentimentLevel[];
  highValueHits: number;
  lastIntent?: Intent;
  createdAt: number;
  lastActivity: number;
}

/** Everything one routed message changes, applied in a single commit */
export interface SessionUpdate {
  leadScore: number;
  escalated: boolean;
  state: ConversationState;
  sentiment: SentimentLevel;
  intent: Intent;
  facts: KnownFacts;
  highValueHit: boolean;
}

/** Scoped access to one session while its lock is held */
export interface SessionHandle {
  readonly snapshot: Readonly<Session>;
  /** Apply the update and return the stored result. Allowed once per handle. */
  commit(update: SessionUpdate): Readonly<Session>;
}
