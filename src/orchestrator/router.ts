import { v4 as uuidv4 } from 'uuid';
import { Classifier } from '../classifier/classifier';
import { TenantContext } from '../config/tenant-loader';
import { TenantSource } from '../config/tenant-registry';
import { Intent, Priority, ReplySource, RouterAction } from '../config/types';
import { ValidationError, ValidationIssue } from '../errors';
import { decisionPriority } from '../escalation/escalation-engine';
import { stateMachine } from '../escalation/state-machine';
import { buildHandoffContext } from '../escalation/handoff-context';
import { EscalationDecision } from '../escalation/types';
import { FaultTriage, FaultTriager } from '../faults/fault-triage';
import { EmbeddingProvider } from '../knowledge/embedding-service';
import { LeadScorer, crossedThreshold } from '../lead/lead-scorer';
import { ConversationMemory } from '../memory/conversation-memory';
import { extractFacts } from '../memory/fact-extractor';
import { KnownFacts, Session } from '../memory/types';
import { NotificationBus } from '../notifications/notification-bus';
import { requestLogger } from '../observability/logger';
import { escalations, messagesProcessed, routerDuration, validationFailures } from '../observability/metrics';
import { StepTimer } from '../observability/trace';
import { PromptGuard, ReplySanitizer } from '../security/prompt-guard';
import { withDeadline } from './deadline';
import { suggestFollowups } from './followups';
import { PromptComposer } from './prompt-composer';
import { REPLY_STEPS, ReplyStep, isEscalating, runReplySteps } from './reply-steps';
import {
  IncomingMessage,
  ProcessOptions,
  RemoteModel,
  ReplyCandidate,
  RoutedTurn,
  RouterResult,
  TurnRecord,
} from './types';

export interface RouterLimits {
  maxMessageLength: number;
  remoteTimeoutMs: number;
  embeddingTimeoutMs: number;
}

export const DEFAULT_LIMITS: Readonly<RouterLimits> = Object.freeze({
  maxMessageLength: 2000,
  remoteTimeoutMs: 12_000,
  embeddingTimeoutMs: 3_000,
});

export interface RouterDeps {
  tenants: TenantSource;
  memory: ConversationMemory;
  remote?: RemoteModel;
  /** Query embeddings for semantic catalog lookup */
  embedder?: EmbeddingProvider;
  notifications?: NotificationBus;
  composer?: PromptComposer;
  guard?: PromptGuard;
  sanitizer?: ReplySanitizer;
  steps?: readonly ReplyStep[];
  limits?: Partial<RouterLimits>;
  now?: () => number;
}

interface NotifyInput {
  tenant: TenantContext;
  before: Readonly<Session>;
  after: Readonly<Session>;
  decision: EscalationDecision;
  text: string;
  requestId: string;
  /** Screened history ending with the current user turn */
  history: readonly TurnRecord[];
  result: Readonly<RouterResult>;
}

interface ActionInput {
  decision: EscalationDecision;
  source: ReplySource;
  intent: Intent;
  leadScore: number;
  leadNotifyThreshold: number;
}

/**
 * escalate wins, then anything that needs contact details (fallback
 * replies, fault reports, flagged rules), then a hot lead.
 */
export function resolveAction({ decision, source, intent, leadScore, leadNotifyThreshold }: ActionInput): RouterAction {
  if (isEscalating(decision)) return 'escalate';
  if (source === 'fallback' || intent === 'fault_report' || decision.kind === 'flag') return 'collect_info';
  if (leadScore >= leadNotifyThreshold) return 'book_call';
  return 'none';
}

function clampConfidence(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * Confidence reported with the reply. Local answers carry their own score;
 * a fallback or hand-off answered nothing, so the classifier's score is
 * capped at half the floor.
 */
export function replyConfidence(candidate: ReplyCandidate, classifierConfidence: number, floor: number): number {
  if (candidate.confidence !== undefined) return clampConfidence(candidate.confidence);
  if (candidate.source === 'fallback') return clampConfidence(Math.min(classifierConfidence, floor / 2));
  return clampConfidence(classifierConfidence);
}

function excerpt(text: string, max = 140): string {
  return text.length > max ? `${text.slice(0, max - 1)}…` : text;
}

/**
 * Runs the decision cascade for one message.
 *
 * Signal steps (pattern match, classification, lead score, fault triage,
 * fact extraction, guard, escalation rules) always run so that ceilings
 * and anger rules see every message. Reply steps then run in order and
 * the first one that answers supplies the reply. The session is read and
 * written under its lock, in a single commit.
 */
export class Router {
  private readonly limits: RouterLimits;
  private readonly composer: PromptComposer;
  private readonly guard: PromptGuard;
  private readonly sanitizer: ReplySanitizer;
  private readonly steps: readonly ReplyStep[];
  private readonly now: () => number;

  constructor(private readonly deps: RouterDeps) {
    this.limits = { ...DEFAULT_LIMITS, ...deps.limits };
    this.composer = deps.composer ?? PromptComposer.fromFile();
    this.guard = deps.guard ?? new PromptGuard();
    this.sanitizer = deps.sanitizer ?? new ReplySanitizer();
    this.steps = deps.steps ?? REPLY_STEPS;
    this.now = deps.now ?? Date.now;
  }

  async process(message: IncomingMessage, options: ProcessOptions = {}): Promise<RouterResult> {
    const turn = await this.route(message, options);
    return turn.result;
  }

  async route(message: IncomingMessage, options: ProcessOptions = {}): Promise<RoutedTurn> {
    const text = this.validate(message);
    const tenant = this.deps.tenants.getOrCreate(message.tenantId);
    const requestId = options.requestId ?? uuidv4();
    const timer = new StepTimer();
    const log = requestLogger(requestId, tenant.tenantId, message.sessionId);
    const stopTimer = routerDuration.startTimer();

    const queryEmbedding = await timer.time('embedding', () => this.embedQuery(tenant, text, log, options.signal));

    const turn = await this.deps.memory.withSession<RoutedTurn>(tenant.tenantId, message.sessionId, async (handle) => {
      const snapshot = handle.snapshot;

      // ───── Signals ─────
      const signalsStep = timer.begin('signals');
      const previousUserTurns = message.history.filter((t) => t.role === 'user').map((t) => t.text);
      const match = tenant.patterns.match(text);
      const classification = new Classifier(tenant.lexicon).classify(text, previousUserTurns, snapshot.sentiment);
      const intent = match?.intent ?? classification.intent;

      const lead = new LeadScorer(tenant.lexicon).score({
        text,
        intent,
        previousScore: snapshot.leadScore,
        highValueHits: snapshot.highValueHits,
        patternHint: match?.leadScoreHint,
      });

      const facts: KnownFacts = { ...snapshot.knownFacts, ...extractFacts(text) };
      let triage: FaultTriage | undefined;
      if (intent === 'fault_report') {
        triage = new FaultTriager(tenant.lexicon).triage(text, facts);
        facts.issue_category = triage.category;
      }

      const guard = this.guard.inspect(text, message.sessionId);
      const decision = tenant.escalation.evaluate({
        text,
        intent,
        sentiment: classification.sentiment,
        previousSentiments: snapshot.recentSentiment,
        turnCount: snapshot.turnCount + 1,
        leadScore: lead.score,
        patternCategory: match?.category,
        faultCategory: triage?.category,
        faultUrgency: triage?.urgency,
        alreadyEscalated: snapshot.escalated,
      });
      const hits = tenant.catalog.search(text, queryEmbedding);
      timer.end(signalsStep);

      // ───── Reply cascade ─────
      const replyStep = timer.begin('reply');
      const history: TurnRecord[] = [
        ...this.guard.screenHistory(message.history, message.sessionId),
        { role: 'user', text, timestamp: this.now() },
      ];
      const candidate = await runReplySteps(this.steps, {
        tenant,
        match,
        hits,
        decision,
        guard,
        sanitizer: this.sanitizer,
        facts,
        history,
        remote: this.deps.remote,
        composer: this.composer,
        remoteTimeoutMs: this.limits.remoteTimeoutMs,
        signal: options.signal,
        log,
      });
      timer.end(replyStep, candidate.remoteFailure !== undefined);

      const resultIntent = candidate.intent ?? intent;
      const action = resolveAction({
        decision,
        source: candidate.source,
        intent: resultIntent,
        leadScore: lead.score,
        leadNotifyThreshold: tenant.thresholds.leadNotifyThreshold,
      });

      const result: Readonly<RouterResult> = Object.freeze({
        replyText: candidate.text,
        intent: resultIntent,
        confidence: replyConfidence(candidate, classification.confidence, tenant.thresholds.confidenceFloor),
        sentiment: classification.sentiment,
        leadScore: lead.score,
        action,
        suggestedFollowups: Object.freeze(
          suggestFollowups({
            intent: resultIntent,
            action,
            leadScore: lead.score,
            leadNotifyThreshold: tenant.thresholds.leadNotifyThreshold,
            missing: triage?.missing ?? [],
            collect: tenant.templates.collect,
            table: tenant.followups,
          }),
        ),
      });

      const escalating = isEscalating(decision);
      const target = stateMachine.resolveTargetState(snapshot.state, escalating, candidate.source);

      if (options.signal?.aborted) {
        log.info({ source: candidate.source }, 'Request aborted before commit; session left unchanged');
        return { result, source: candidate.source, state: snapshot.state, decision, requestId, committed: false };
      }

      const commitStep = timer.begin('commit');
      const { newState } = stateMachine.transition(
        message.sessionId,
        snapshot.state,
        target,
        decision.kind === 'escalate' ? `rule:${decision.rule.id}` : `reply:${candidate.source}`,
      );
      const stored = handle.commit({
        leadScore: lead.score,
        escalated: escalating,
        state: newState,
        sentiment: classification.sentiment,
        intent: resultIntent,
        facts,
        highValueHit: lead.highValueHit,
      });
      timer.end(commitStep);

      this.notify({ tenant, before: snapshot, after: stored, decision, text, requestId, history, result });

      return { result, source: candidate.source, state: stored.state, decision, requestId, committed: true };
    });

    stopTimer({ source: turn.source });
    messagesProcessed.inc({ tenant: tenant.tenantId, source: turn.source, action: turn.result.action });
    log.info(
      {
        source: turn.source,
        intent: turn.result.intent,
        action: turn.result.action,
        leadScore: turn.result.leadScore,
        sentiment: turn.result.sentiment,
        decision: turn.decision.kind,
        timings: timer.summary(),
        failedSteps: timer.failedSteps(),
      },
      'Message routed',
    );
    return turn;
  }

  // ───── Private ─────

  private validate(message: IncomingMessage): string {
    const fail = (issue: ValidationIssue, msg: string): never => {
      validationFailures.inc({ code: issue });
      throw new ValidationError(issue, msg);
    };

    if (!message.tenantId || !message.tenantId.trim()) fail('missing_tenant', 'tenant_id is required');
    if (!message.sessionId || !message.sessionId.trim()) fail('missing_session', 'session_id is required');
    const text = (message.text ?? '').trim();
    if (!text) fail('empty', 'Message is empty');
    if (text.length > this.limits.maxMessageLength) {
      fail('too_long', `Message exceeds ${this.limits.maxMessageLength} characters`);
    }
    return text;
  }

  /** Best effort: a slow or failing embedding call just means keyword lookup */
  private async embedQuery(
    tenant: TenantContext,
    text: string,
    log: ReturnType<typeof requestLogger>,
    signal?: AbortSignal,
  ): Promise<number[] | undefined> {
    const embedder = this.deps.embedder;
    if (!embedder || !tenant.catalog.hasEmbeddings) return undefined;
    try {
      return await withDeadline((s) => embedder.embed(text, s), this.limits.embeddingTimeoutMs, signal);
    } catch (err) {
      log.warn({ err }, 'Query embedding failed, using keyword lookup');
      return undefined;
    }
  }

  private notify({ tenant, before, after, decision, text, requestId, history, result }: NotifyInput): void {
    const bus = this.deps.notifications;
    const priority = decisionPriority(decision);

    if ((decision.kind === 'escalate' || decision.kind === 'flag') && priority) {
      escalations.inc({ decision: decision.kind, priority, rule: decision.rule.id });
      bus?.publish({
        kind: decision.kind === 'escalate' ? 'escalation' : 'flag',
        tenantId: tenant.tenantId,
        sessionId: after.sessionId,
        priority,
        category: decision.rule.id,
        summary: `${tenant.profile.companyName}: ${decision.rule.id} after ${after.turnCount} turn(s): "${excerpt(text)}"`,
        notifyTargets: decision.rule.notifyTargets,
        timestamp: this.now(),
        requestId,
        context: buildHandoffContext({
          ruleId: decision.rule.id,
          facts: after.knownFacts,
          intent: result.intent,
          sentiment: result.sentiment,
          leadScore: after.leadScore,
          turnCount: after.turnCount,
          history,
          reply: result.replyText,
        }),
      });
    }

    const threshold = tenant.thresholds.leadNotifyThreshold;
    if (crossedThreshold(before.leadScore, after.leadScore, threshold)) {
      const leadPriority: Priority = after.leadScore >= tenant.thresholds.leadEscalationCeiling ? 'high' : 'medium';
      bus?.publish({
        kind: 'lead',
        tenantId: tenant.tenantId,
        sessionId: after.sessionId,
        priority: leadPriority,
        category: 'lead_threshold',
        summary: `${tenant.profile.companyName}: lead score ${after.leadScore}/5: "${excerpt(text)}"`,
        notifyTargets: [],
        timestamp: this.now(),
        requestId,
      });
    }
  }
}
