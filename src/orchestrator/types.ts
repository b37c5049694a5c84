import {
  ConversationState,
  Intent,
  ReplySource,
  RouterAction,
  SentimentLevel,
} from '../config/types';
import { RemoteFailureReason } from '../errors';
import { EscalationDecision } from '../escalation/types';

// ───── Inputs ─────

export interface TurnRecord {
  role: 'user' | 'assistant';
  text: string;
  /** Epoch milliseconds */
  timestamp: number;
}

export interface IncomingMessage {
  text: string;
  sessionId: string;
  tenantId: string;
  /** Earlier turns, oldest first. Does not include `text`. */
  history: readonly TurnRecord[];
}

export interface ProcessOptions {
  signal?: AbortSignal;
  requestId?: string;
}

/**
 * Remote generative model. `prompt` is the composed system prompt,
 * `grounding` the retrieved catalog text (empty when none), and
 * `history` ends with the current user turn.
 */
export type RemoteModel = (
  prompt: string,
  grounding: string,
  history: readonly TurnRecord[],
  signal?: AbortSignal,
) => Promise<string>;

// ───── Output ─────

export interface RouterResult {
  replyText: string;
  intent: Intent;
  confidence: number;
  sentiment: SentimentLevel;
  leadScore: number;
  action: RouterAction;
  suggestedFollowups: readonly string[];
}

/** A reply step's answer */
export interface ReplyCandidate {
  source: ReplySource;
  text: string;
  /** Overrides the classifier's intent/confidence in the result */
  intent?: Intent;
  confidence?: number;
  remoteFailure?: RemoteFailureReason;
  guarded?: boolean;
}

/** Full outcome of one routed message, for callers that need more than the result */
export interface RoutedTurn {
  result: Readonly<RouterResult>;
  source: ReplySource;
  state: ConversationState;
  decision: EscalationDecision;
  requestId: string;
  /** False when the request was aborted before its update was stored */
  committed: boolean;
}
