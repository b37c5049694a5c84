// ─── Intents ──────────────────────────────────────────────────────
export const INTENTS = [
  'greeting',
  'gratitude',
  'goodbye',
  'contact_info',
  'opening_hours',
  'fault_report',
  'pricing_question',
  'booking_request',
  'rental_inquiry',
  'general_info',
  'complaint',
  'escalation_demand',
  'legal_threat',
  'unknown',
] as const;

export type Intent = (typeof INTENTS)[number];

const INTENT_SET: ReadonlySet<string> = new Set(INTENTS);

export function isIntent(value: string): value is Intent {
  return INTENT_SET.has(value);
}

// ─── Sentiment ────────────────────────────────────────────────────
/** Ordered from least to most severe */
export const SENTIMENT_LEVELS = ['positive', 'neutral', 'frustrated', 'angry'] as const;

export type SentimentLevel = (typeof SENTIMENT_LEVELS)[number];

export function sentimentRank(level: SentimentLevel): number {
  return SENTIMENT_LEVELS.indexOf(level);
}

// ─── Escalation priority ──────────────────────────────────────────
export const PRIORITIES = ['low', 'medium', 'high', 'critical'] as const;

export type Priority = (typeof PRIORITIES)[number];

export function priorityRank(priority: Priority): number {
  return PRIORITIES.indexOf(priority);
}

// ─── Conversation state ───────────────────────────────────────────
export const CONVERSATION_STATES = ['local', 'ai_assisted', 'escalated'] as const;

export type ConversationState = (typeof CONVERSATION_STATES)[number];

// ─── Router outputs ───────────────────────────────────────────────
export type RouterAction = 'none' | 'collect_info' | 'book_call' | 'escalate';

export type ReplySource = 'pattern' | 'catalog' | 'remote' | 'fallback';

// ─── Fault triage ─────────────────────────────────────────────────
export const FAULT_URGENCIES = ['low', 'medium', 'high', 'critical'] as const;

export type FaultUrgency = (typeof FAULT_URGENCIES)[number];

export type FaultCategory =
  | 'water'
  | 'electrical'
  | 'heating'
  | 'security'
  | 'structural'
  | 'appliance'
  | 'other';

// ─── Tenant configuration (as written in config/tenants/*.yaml) ──

export interface TenantProfile {
  companyName: string;
  phone: string;
  email: string;
  website?: string;
  businessHours: string;
  locations: string[];
  /** Falls back to `phone` when absent */
  emergencyPhone?: string;
  bookingLink?: string;
}

export interface TenantThresholds {
  /** Minimum local confidence that keeps the remote model out of the loop */
  confidenceFloor: number;
  maxConversationTurns: number;
  angryTurnsToEscalate: number;
  leadNotifyThreshold: number;
  leadEscalationCeiling: number;
  semanticThreshold: number;
  minKeywordOverlap: number;
}

export const DEFAULT_THRESHOLDS: Readonly<TenantThresholds> = Object.freeze({
  confidenceFloor: 0.7,
  maxConversationTurns: 8,
  angryTurnsToEscalate: 2,
  leadNotifyThreshold: 4,
  leadEscalationCeiling: 5,
  semanticThreshold: 0.82,
  minKeywordOverlap: 0.25,
});

export interface TenantTemplates {
  fallback: string;
  handoff: string;
  alreadyEscalated: string;
  guarded: string;
  /** Questions asked when a fault report lacks contact details */
  collect: {
    property: string;
    phone: string;
    email: string;
    name: string;
  };
}

export interface EscalationTrigger {
  keywords?: string[];
  sentimentAtLeast?: SentimentLevel;
  /** Number of consecutive turns (including this one) at or above `sentimentAtLeast` */
  consecutiveTurns?: number;
  turnCountAbove?: number;
  leadScoreAtLeast?: number;
  /** Matched against the pattern category, the classified intent and the fault category */
  categories?: string[];
  urgencyAtLeast?: FaultUrgency;
}

export interface EscalationRule {
  id: string;
  trigger: EscalationTrigger;
  priority: Priority;
  /** false: notify staff but keep the bot answering */
  autoEscalate: boolean;
  notifyTargets: string[];
  replyTemplate?: string;
}

export interface PatternRuleConfig {
  category: string;
  intent: Intent;
  priority?: Priority;
  emergency?: boolean;
  regex?: string;
  keywords?: string[];
  response: string;
  confidence?: number;
  leadScoreHint?: number;
}

export interface KnowledgeEntryConfig {
  id: string;
  question: string;
  answer: string;
  keywords: string[];
  embedding?: number[];
}

export type FollowupTable = Partial<Record<Intent | 'lead_high' | 'lead_mid' | 'default', string[]>>;

/** Raw shape of a tenant YAML file after schema validation */
export interface TenantFile {
  tenantId: string;
  profile: TenantProfile;
  thresholds?: Partial<TenantThresholds>;
  templates?: Partial<Omit<TenantTemplates, 'collect'>> & { collect?: Partial<TenantTemplates['collect']> };
  patterns?: PatternRuleConfig[];
  escalationRules?: EscalationRule[];
  knowledge?: KnowledgeEntryConfig[];
  followups?: FollowupTable;
}
