import { Intent, Priority, SentimentLevel } from '../config/types';

/**
 * escalation: a human takes over.
 * flag: a rule without auto-escalation matched; staff are told, the bot keeps answering.
 * lead: the lead score crossed the notification threshold.
 */
export type NotificationKind = 'escalation' | 'flag' | 'lead';

/** What staff need to pick up a conversation without reading the whole log */
export interface HandoffContext {
  customer: { name?: string; email?: string; phone?: string; property?: string };
  issueCategory?: string;
  /** First user message of the conversation */
  issue: string;
  intent: Intent;
  sentiment: SentimentLevel;
  leadScore: number;
  turnCount: number;
  /** Trailing turns including the reply just given, oldest first */
  recentMessages: Array<{ role: 'user' | 'assistant'; text: string }>;
  suggestedActions: string[];
}

export interface Notification {
  kind: NotificationKind;
  tenantId: string;
  sessionId: string;
  priority: Priority;
  /** Rule id for escalations and flags, `lead_threshold` for leads */
  category: string;
  summary: string;
  notifyTargets: readonly string[];
  timestamp: number;
  requestId?: string;
  /** Set on escalations and flags */
  context?: HandoffContext;
}

export interface NotificationSink {
  readonly name: string;
  deliver(notification: Notification): Promise<void>;
}
