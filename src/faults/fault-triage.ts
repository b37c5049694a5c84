import { FaultCategory, FaultUrgency } from '../config/types';
import { Lexicon } from '../classifier/lexicon';
import { KnownFacts } from '../memory/types';
import { termMatches, toTokenText } from '../text/normalize';

export type MissingField = 'property' | 'phone' | 'email' | 'name';

export interface FaultTriage {
  category: FaultCategory;
  urgency: FaultUrgency;
  /** Contact details still needed to dispatch someone, most important first */
  missing: MissingField[];
}

/**
 * Classifies a fault report: what broke, how urgent it is, and which
 * contact details are still missing. Only the location and one way to
 * reach the tenant are required; the name is asked for last.
 */
export class FaultTriager {
  constructor(private readonly lexicon: Lexicon) {}

  triage(text: string, facts: Readonly<KnownFacts>): FaultTriage {
    const tokenText = toTokenText(text);

    let urgency: FaultUrgency = 'low';
    for (const level of this.lexicon.faultUrgency) {
      if (level.terms.some((t) => termMatches(t, tokenText))) {
        urgency = level.urgency;
        break;
      }
    }

    let category: FaultCategory = 'other';
    let best = 0;
    for (const { category: candidate, terms } of this.lexicon.faultCategories) {
      const hits = terms.filter((t) => termMatches(t, tokenText)).length;
      if (hits > best) {
        best = hits;
        category = candidate;
      }
    }

    const missing: MissingField[] = [];
    if (!facts.property) missing.push('property');
    if (!facts.phone && !facts.email) missing.push('phone', 'email');
    if (!facts.name) missing.push('name');

    return { category, urgency, missing };
  }
}

const URGENCY_ORDER: readonly FaultUrgency[] = ['low', 'medium', 'high', 'critical'];

export function urgencyAtLeast(actual: FaultUrgency, required: FaultUrgency): boolean {
  return URGENCY_ORDER.indexOf(actual) >= URGENCY_ORDER.indexOf(required);
}
