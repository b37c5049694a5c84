import {
  ConversationState,
  EscalationRule,
  FaultCategory,
  FaultUrgency,
  Intent,
  SentimentLevel,
} from '../config/types';

// ───── State machine ─────

export const STATE_TRANSITIONS: Record<ConversationState, readonly ConversationState[]> = {
  local: ['ai_assisted', 'escalated'],
  ai_assisted: ['escalated'],
  escalated: [],
};

export interface StateTransitionEvent {
  sessionId: string;
  from: ConversationState;
  to: ConversationState;
  reason: string;
  timestamp: number;
}

// ───── Rule evaluation ─────

/** Everything the rules look at for one message */
export interface EscalationSignals {
  text: string;
  intent: Intent;
  /** Smoothed level for this turn */
  sentiment: SentimentLevel;
  /** Smoothed levels of earlier turns, oldest first */
  previousSentiments: readonly SentimentLevel[];
  /** Turn count including this message */
  turnCount: number;
  leadScore: number;
  patternCategory?: string;
  faultCategory?: FaultCategory;
  faultUrgency?: FaultUrgency;
  alreadyEscalated: boolean;
}

export type EscalationDecision =
  | { kind: 'already_escalated'; reply: string }
  | { kind: 'escalate'; rule: EscalationRule; reply: string }
  | { kind: 'flag'; rule: EscalationRule }
  | { kind: 'none' };
