import {
  EscalationRule,
  Priority,
  TenantTemplates,
  TenantThresholds,
  priorityRank,
  sentimentRank,
} from '../config/types';
import { Lexicon } from '../classifier/lexicon';
import { urgencyAtLeast } from '../faults/fault-triage';
import { CompiledTerm, compileTerm, termMatches, toTokenText } from '../text/normalize';
import { TemplateValues, renderTemplate } from '../text/template';
import { EscalationDecision, EscalationSignals } from './types';

export interface CompiledRule {
  readonly rule: Readonly<EscalationRule>;
  readonly terms: readonly CompiledTerm[];
  /** Rendered hand-off reply */
  readonly reply: string;
}

export interface EscalationEngineOptions {
  thresholds: Pick<TenantThresholds, 'angryTurnsToEscalate' | 'maxConversationTurns' | 'leadEscalationCeiling'>;
  lexicon: Lexicon;
  values: TemplateValues;
  /** Already rendered */
  templates: Pick<TenantTemplates, 'handoff' | 'alreadyEscalated'>;
}

/**
 * Rules every tenant gets, appended after the tenant's own so that a
 * tenant rule of equal priority is tried first.
 */
export function builtInRules(
  thresholds: EscalationEngineOptions['thresholds'],
  lexicon: Lexicon,
): EscalationRule[] {
  return [
    {
      id: 'legal_language',
      trigger: { keywords: [...lexicon.legal] },
      priority: 'critical',
      autoEscalate: true,
      notifyTargets: [],
    },
    {
      id: 'angry_streak',
      trigger: { sentimentAtLeast: 'angry', consecutiveTurns: thresholds.angryTurnsToEscalate },
      priority: 'high',
      autoEscalate: true,
      notifyTargets: [],
    },
    {
      id: 'asked_for_human',
      trigger: { categories: ['escalation_demand'] },
      priority: 'high',
      autoEscalate: true,
      notifyTargets: [],
    },
    {
      id: 'turn_ceiling',
      trigger: { turnCountAbove: thresholds.maxConversationTurns },
      priority: 'medium',
      autoEscalate: true,
      notifyTargets: [],
    },
    {
      id: 'lead_ceiling',
      trigger: { leadScoreAtLeast: thresholds.leadEscalationCeiling },
      priority: 'medium',
      autoEscalate: true,
      notifyTargets: [],
    },
  ];
}

/** Length of the run of trailing levels at or above `minimum` */
function trailingStreak(levels: EscalationSignals['previousSentiments'], minimum: number): number {
  let streak = 0;
  for (let i = levels.length - 1; i >= 0; i--) {
    if (sentimentRank(levels[i]) < minimum) break;
    streak++;
  }
  return streak;
}

function matches(compiled: CompiledRule, signals: EscalationSignals, tokenText: ReturnType<typeof toTokenText>): boolean {
  const { trigger } = compiled.rule;

  if (trigger.keywords && !compiled.terms.some((t) => termMatches(t, tokenText))) return false;

  if (trigger.sentimentAtLeast) {
    const needed = trigger.consecutiveTurns ?? 1;
    const levels = [...signals.previousSentiments, signals.sentiment];
    if (trailingStreak(levels, sentimentRank(trigger.sentimentAtLeast)) < needed) return false;
  }

  if (trigger.turnCountAbove !== undefined && !(signals.turnCount > trigger.turnCountAbove)) return false;
  if (trigger.leadScoreAtLeast !== undefined && signals.leadScore < trigger.leadScoreAtLeast) return false;

  if (trigger.categories) {
    const seen = [signals.patternCategory, signals.intent, signals.faultCategory];
    if (!trigger.categories.some((c) => seen.includes(c))) return false;
  }

  if (trigger.urgencyAtLeast) {
    if (!signals.faultUrgency || !urgencyAtLeast(signals.faultUrgency, trigger.urgencyAtLeast)) return false;
  }

  return true;
}

/**
 * Decides whether a message needs a human. Rules are tried by descending
 * priority; equal priorities keep configuration order (tenant rules in
 * file order, then the built-ins). The first match wins.
 */
export class EscalationEngine {
  readonly rules: readonly CompiledRule[];
  private readonly alreadyEscalatedReply: string;

  private constructor(rules: CompiledRule[], alreadyEscalatedReply: string) {
    this.rules = Object.freeze(rules);
    this.alreadyEscalatedReply = alreadyEscalatedReply;
  }

  static compile(tenantRules: readonly EscalationRule[], options: EscalationEngineOptions): EscalationEngine {
    const all = [...tenantRules, ...builtInRules(options.thresholds, options.lexicon)];
    const compiled = all
      .map((rule) => ({
        rule: Object.freeze({ ...rule, notifyTargets: [...rule.notifyTargets] }),
        terms: Object.freeze((rule.trigger.keywords ?? []).map((k) => compileTerm(k))),
        reply: rule.replyTemplate
          ? renderTemplate(rule.replyTemplate, options.values, `escalation rule ${rule.id}`)
          : options.templates.handoff,
      }))
      // Array.prototype.sort is stable
      .sort((a, b) => priorityRank(b.rule.priority) - priorityRank(a.rule.priority));

    return new EscalationEngine(compiled, options.templates.alreadyEscalated);
  }

  evaluate(signals: EscalationSignals): EscalationDecision {
    if (signals.alreadyEscalated) {
      return { kind: 'already_escalated', reply: this.alreadyEscalatedReply };
    }

    const tokenText = toTokenText(signals.text);
    for (const compiled of this.rules) {
      if (!matches(compiled, signals, tokenText)) continue;
      return compiled.rule.autoEscalate
        ? { kind: 'escalate', rule: compiled.rule, reply: compiled.reply }
        : { kind: 'flag', rule: compiled.rule };
    }
    return { kind: 'none' };
  }

  ruleIds(): string[] {
    return this.rules.map((r) => r.rule.id);
  }
}

export function decisionPriority(decision: EscalationDecision): Priority | undefined {
  return decision.kind === 'escalate' || decision.kind === 'flag' ? decision.rule.priority : undefined;
}
