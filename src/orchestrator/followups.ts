import { FollowupTable, Intent, RouterAction, TenantTemplates } from '../config/types';
import { MissingField } from '../faults/fault-triage';

export const MAX_FOLLOWUPS = 4;

const DEFAULT_FOLLOWUPS: Readonly<FollowupTable> = Object.freeze({
  greeting: ['Jag vill göra en felanmälan', 'Lediga lägenheter', 'Kontaktuppgifter'],
  gratitude: [],
  goodbye: [],
  contact_info: ['Öppettider', 'Jag vill göra en felanmälan'],
  opening_hours: ['Kontaktuppgifter', 'Jag vill göra en felanmälan'],
  rental_inquiry: ['Boka en visning', 'Vad kostar hyran?', 'Hur ansöker jag?'],
  pricing_question: ['Boka en visning', 'Ring upp mig'],
  booking_request: ['Ring upp mig', 'Kontaktuppgifter'],
  general_info: ['Lediga lägenheter', 'Jag vill göra en felanmälan'],
  lead_high: ['Boka en visning', 'Ring upp mig'],
  lead_mid: ['Boka en visning', 'Vad kostar hyran?'],
  default: ['Jag vill göra en felanmälan', 'Lediga lägenheter', 'Kontaktuppgifter'],
});

export interface FollowupInput {
  intent: Intent;
  action: RouterAction;
  leadScore: number;
  leadNotifyThreshold: number;
  /** Contact details a fault report still lacks */
  missing: readonly MissingField[];
  collect: TenantTemplates['collect'];
  table: Readonly<FollowupTable>;
}

function lookup(table: Readonly<FollowupTable>, key: keyof FollowupTable): readonly string[] | undefined {
  return table[key] ?? DEFAULT_FOLLOWUPS[key];
}

/**
 * Quick-reply suggestions. Escalated turns get none; fault reports ask
 * for whatever contact detail is missing; otherwise the lead band and
 * then the intent pick an entry, tenant table first.
 */
export function suggestFollowups(input: FollowupInput): string[] {
  if (input.action === 'escalate') return [];

  if (input.intent === 'fault_report' && input.missing.length > 0) {
    return input.missing.map((field) => input.collect[field]).slice(0, MAX_FOLLOWUPS);
  }

  const picked =
    (input.leadScore >= input.leadNotifyThreshold ? lookup(input.table, 'lead_high') : undefined) ??
    lookup(input.table, input.intent) ??
    (input.leadScore >= 3 ? lookup(input.table, 'lead_mid') : undefined) ??
    lookup(input.table, 'default') ??
    [];

  return picked.slice(0, MAX_FOLLOWUPS);
}
