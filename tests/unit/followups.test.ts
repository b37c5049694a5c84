import { DEFAULT_TEMPLATES } from '../../src/config/tenant-loader';
import { FollowupInput, MAX_FOLLOWUPS, suggestFollowups } from '../../src/orchestrator/followups';

function input(overrides: Partial<FollowupInput> = {}): FollowupInput {
  return {
    intent: 'unknown',
    action: 'none',
    leadScore: 1,
    leadNotifyThreshold: 4,
    missing: [],
    collect: DEFAULT_TEMPLATES.collect,
    table: {},
    ...overrides,
  };
}

describe('suggestFollowups', () => {
  it('suggests nothing once the conversation is handed off', () => {
    expect(suggestFollowups(input({ action: 'escalate', intent: 'greeting' }))).toEqual([]);
  });

  it('asks for missing contact details on a fault report', () => {
    expect(suggestFollowups(input({ intent: 'fault_report', action: 'collect_info', missing: ['property', 'name'] }))).toEqual([
      'Vilken adress och lägenhet gäller det?',
      'Vad heter du?',
    ]);
  });

  it('pushes a booking once the lead is hot', () => {
    expect(suggestFollowups(input({ intent: 'pricing_question', leadScore: 4 }))).toEqual([
      'Boka en visning',
      'Ring upp mig',
    ]);
  });

  it('prefers the tenant table over the defaults', () => {
    const table = { rental_inquiry: ['Se lediga lägenheter'] };
    expect(suggestFollowups(input({ intent: 'rental_inquiry', leadScore: 3, table }))).toEqual(['Se lediga lägenheter']);
  });

  it('keeps an intentionally empty entry empty', () => {
    expect(suggestFollowups(input({ intent: 'gratitude' }))).toEqual([]);
  });

  it('falls back to the mid-lead entry, then the default', () => {
    expect(suggestFollowups(input({ leadScore: 3 }))).toEqual(['Boka en visning', 'Vad kostar hyran?']);
    expect(suggestFollowups(input())).toEqual(['Jag vill göra en felanmälan', 'Lediga lägenheter', 'Kontaktuppgifter']);
  });

  it('caps the number of suggestions', () => {
    const table = { greeting: ['1', '2', '3', '4', '5', '6'] };
    expect(suggestFollowups(input({ intent: 'greeting', table }))).toHaveLength(MAX_FOLLOWUPS);
  });
});
