import type { Logger } from 'pino';
import { TenantContext } from '../config/tenant-loader';
import { RemoteModelError, toRemoteModelError } from '../errors';
import { EscalationDecision } from '../escalation/types';
import { CatalogHit } from '../knowledge/knowledge-catalog';
import { KnownFacts } from '../memory/types';
import { remoteModelFailures } from '../observability/metrics';
import { MatchResult } from '../patterns/pattern-matcher';
import { GuardVerdict, ReplySanitizer } from '../security/prompt-guard';
import { withDeadline } from './deadline';
import { PromptComposer, formatGrounding } from './prompt-composer';
import { RemoteModel, ReplyCandidate, TurnRecord } from './types';

/** Everything the reply steps may read. Built once per message, never mutated. */
export interface StepContext {
  tenant: TenantContext;
  match: Readonly<MatchResult> | null;
  /** Catalog hits, best first */
  hits: readonly CatalogHit[];
  decision: EscalationDecision;
  guard: GuardVerdict;
  sanitizer: ReplySanitizer;
  facts: Readonly<KnownFacts>;
  /** Screened client history, ending with the current user turn */
  history: readonly TurnRecord[];
  remote?: RemoteModel;
  composer: PromptComposer;
  remoteTimeoutMs: number;
  signal?: AbortSignal;
  log: Logger;
}

export interface ReplyStep {
  readonly name: string;
  run(ctx: StepContext): Promise<ReplyCandidate | null>;
}

export function isEscalating(decision: EscalationDecision): boolean {
  return decision.kind === 'escalate' || decision.kind === 'already_escalated';
}

/**
 * Canned answer. Emergency instructions are always given: whatever the
 * tenant's confidence floor, and even while handing off.
 */
export const patternStep: ReplyStep = {
  name: 'pattern',
  async run({ match, decision, tenant }) {
    if (!match) return null;
    if (!match.emergency) {
      if (match.confidence < tenant.thresholds.confidenceFloor || isEscalating(decision)) return null;
    }
    return { source: 'pattern', text: match.response, intent: match.intent, confidence: match.confidence };
  },
};

export const catalogStep: ReplyStep = {
  name: 'catalog',
  async run({ hits, decision, tenant }) {
    const best = hits[0];
    if (!best || isEscalating(decision) || best.score < tenant.thresholds.confidenceFloor) return null;
    return { source: 'catalog', text: best.entry.answer, confidence: best.score };
  },
};

/** Deterministic hand-off text once a human is involved */
export const handoffStep: ReplyStep = {
  name: 'handoff',
  async run({ decision }) {
    if (decision.kind === 'escalate' || decision.kind === 'already_escalated') {
      return { source: 'fallback', text: decision.reply };
    }
    return null;
  },
};

/**
 * Grounded remote answer. Every failure mode ends here as the tenant's
 * fallback reply; nothing is thrown past this step.
 */
export const remoteStep: ReplyStep = {
  name: 'remote',
  async run(ctx) {
    if (ctx.guard.flagged) {
      return { source: 'fallback', text: ctx.tenant.templates.guarded, guarded: true };
    }
    const remote = ctx.remote;
    if (!remote) return null;

    const grounding = formatGrounding(ctx.hits);
    const prompt = ctx.composer.compose(ctx.tenant, ctx.facts, grounding.length > 0);

    try {
      const text = await withDeadline(
        (signal) => remote(prompt, grounding, ctx.history, signal),
        ctx.remoteTimeoutMs,
        ctx.signal,
      );
      const reply = ctx.sanitizer.sanitize(text).text;
      if (!reply) throw new RemoteModelError('malformed', 'Remote model returned an empty reply');
      return { source: 'remote', text: reply };
    } catch (err) {
      const failure = toRemoteModelError(err);
      remoteModelFailures.inc({ reason: failure.reason });
      ctx.log.warn({ err: failure, reason: failure.reason }, 'Remote model failed, using fallback reply');
      return { source: 'fallback', text: ctx.tenant.templates.fallback, remoteFailure: failure.reason };
    }
  },
};

export const fallbackStep: ReplyStep = {
  name: 'fallback',
  async run({ tenant }) {
    return { source: 'fallback', text: tenant.templates.fallback };
  },
};

/** Tried in order; the first step that answers supplies the reply */
export const REPLY_STEPS: readonly ReplyStep[] = Object.freeze([
  patternStep,
  catalogStep,
  handoffStep,
  remoteStep,
  fallbackStep,
]);

export async function runReplySteps(steps: readonly ReplyStep[], ctx: StepContext): Promise<ReplyCandidate> {
  for (const step of steps) {
    const candidate = await step.run(ctx);
    if (candidate) return candidate;
  }
  return { source: 'fallback', text: ctx.tenant.templates.fallback };
}
