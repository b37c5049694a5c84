import { Intent, SentimentLevel } from '../config/types';
import { KnownFacts } from '../memory/types';
import { HandoffContext } from '../notifications/types';

export const HANDOFF_RECENT_MESSAGES = 5;
const ISSUE_MAX_CHARS = 200;
const MESSAGE_MAX_CHARS = 100;

const READ_CONVERSATION = 'Läs igenom konversationen för kontext';

/** Extra steps for staff, by built-in rule id */
const RULE_ACTIONS: Readonly<Record<string, readonly string[]>> = Object.freeze({
  legal_language: ['Stäm av med bolagets jurist innan ni svarar', 'Dokumentera ärendet noga'],
  angry_streak: [
    'Bekräfta kundens upplevelse',
    'Erbjud en konkret lösning eller tid för åtgärd',
    'Följ upp personligen inom 24 timmar',
  ],
  asked_for_human: ['Kontakta kunden så snart som möjligt'],
  turn_ceiling: ['Ta över samtalet utan att kunden behöver upprepa sig'],
  lead_ceiling: ['Kontakta kunden om visning eller lediga objekt'],
});

interface ConversationTurn {
  role: 'user' | 'assistant';
  text: string;
}

export interface HandoffInput {
  ruleId: string;
  facts: Readonly<KnownFacts>;
  intent: Intent;
  sentiment: SentimentLevel;
  leadScore: number;
  turnCount: number;
  /** Conversation so far, ending with the current user turn */
  history: readonly ConversationTurn[];
  /** Reply given to the current turn */
  reply: string;
}

function clip(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 1)}…` : text;
}

export function buildHandoffContext(input: HandoffInput): HandoffContext {
  const { facts } = input;
  const conversation: ConversationTurn[] = [
    ...input.history.map(({ role, text }) => ({ role, text })),
    { role: 'assistant', text: input.reply },
  ];
  const firstUserTurn = input.history.find((turn) => turn.role === 'user');

  const suggestedActions = [READ_CONVERSATION, ...(RULE_ACTIONS[input.ruleId] ?? [])];
  if (facts.issue_category) suggestedActions.push(`Planera åtgärd för felanmälan (${facts.issue_category})`);
  if (!facts.phone && !facts.email) suggestedActions.push('Be kunden om telefonnummer eller e-post');

  return {
    customer: { name: facts.name, email: facts.email, phone: facts.phone, property: facts.property },
    issueCategory: facts.issue_category,
    issue: firstUserTurn ? clip(firstUserTurn.text, ISSUE_MAX_CHARS) : '',
    intent: input.intent,
    sentiment: input.sentiment,
    leadScore: input.leadScore,
    turnCount: input.turnCount,
    recentMessages: conversation
      .slice(-HANDOFF_RECENT_MESSAGES)
      .map((turn) => ({ role: turn.role, text: clip(turn.text, MESSAGE_MAX_CHARS) })),
    suggestedActions,
  };
}
