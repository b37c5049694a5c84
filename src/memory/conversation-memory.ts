import { CONVERSATION_STATES, ConversationState } from '../config/types';
import { StateCorruptionError } from '../errors';
import { logger } from '../observability/logger';
import { activeSessions } from '../observability/metrics';
import { KeyedMutex } from './keyed-mutex';
import { KnownFacts, SENTIMENT_HISTORY_LIMIT, Session, SessionHandle, SessionUpdate } from './types';

const DEFAULT_TTL_MS = 60 * 60 * 1000;

export interface ConversationMemoryOptions {
  ttlMs?: number;
  now?: () => number;
}

function sessionKey(tenantId: string, sessionId: string): string {
  return `${tenantId}:${sessionId}`;
}

function stateRank(state: ConversationState): number {
  return CONVERSATION_STATES.indexOf(state);
}

function mergeFacts(existing: KnownFacts, learned: KnownFacts): KnownFacts {
  const merged: KnownFacts = { ...existing };
  for (const [key, value] of Object.entries(learned)) {
    if (value && (key === 'name' || key === 'email' || key === 'phone' || key === 'property' || key === 'issue_category')) {
      merged[key] = value;
    }
  }
  return merged;
}

/**
 * Apply one message's update. Monotonic fields are merged so the safer
 * value always wins: lead score by max, escalation by or, state by rank.
 */
export function mergeSession(current: Session, update: SessionUpdate, now: number): Session {
  const escalated = current.escalated || update.escalated;
  const state = escalated ? 'escalated' : stateRank(update.state) > stateRank(current.state) ? update.state : current.state;
  return {
    ...current,
    turnCount: current.turnCount + 1,
    leadScore: Math.max(current.leadScore, update.leadScore),
    knownFacts: mergeFacts(current.knownFacts, update.facts),
    escalated,
    state,
    sentiment: update.sentiment,
    recentSentiment: [...current.recentSentiment, update.sentiment].slice(-SENTIMENT_HISTORY_LIMIT),
    highValueHits: current.highValueHits + (update.highValueHit ? 1 : 0),
    lastIntent: update.intent,
    lastActivity: now,
  };
}

/**
 * Process-lifetime session store.
 *
 * All reads that feed a decision and the single write that records it
 * happen inside `withSession`, which holds a per-session lock. Sessions
 * idle for longer than the TTL are dropped by `reap`.
 */
export class ConversationMemory {
  private readonly sessions = new Map<string, Session>();
  private readonly mutex = new KeyedMutex();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private reaper?: NodeJS.Timeout;
  private readonly log = logger.child({ component: 'conversation-memory' });

  constructor(options: ConversationMemoryOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  /** Copy of the stored session, if any */
  get(tenantId: string, sessionId: string): Readonly<Session> | undefined {
    const session = this.sessions.get(sessionKey(tenantId, sessionId));
    return session ? { ...session } : undefined;
  }

  /**
   * Run `fn` with exclusive access to one session. The handle's commit
   * may be called at most once, and only while `fn` is running.
   */
  async withSession<T>(tenantId: string, sessionId: string, fn: (handle: SessionHandle) => Promise<T>): Promise<T> {
    const key = sessionKey(tenantId, sessionId);
    return this.mutex.runExclusive(key, async () => {
      const stored = this.sessions.get(key);
      const snapshot = Object.freeze({ ...(stored ?? this.fresh(tenantId, sessionId)) });
      let open = true;
      let committed = false;

      const handle: SessionHandle = {
        snapshot,
        commit: (update) => {
          if (!open) throw new StateCorruptionError(sessionId, 'Session committed after its lock was released');
          if (committed) throw new StateCorruptionError(sessionId, 'Session committed twice for one message');
          committed = true;
          const next = mergeSession(snapshot, update, this.now());
          this.sessions.set(key, next);
          activeSessions.set(this.sessions.size);
          return Object.freeze({ ...next });
        },
      };

      try {
        return await fn(handle);
      } finally {
        open = false;
      }
    });
  }

  /**
   * Forget a session. Takes the session lock, so a message already in
   * flight commits first and is then forgotten with the rest. Resolves
   * true if a session existed.
   */
  async reset(tenantId: string, sessionId: string): Promise<boolean> {
    const key = sessionKey(tenantId, sessionId);
    return this.mutex.runExclusive(key, async () => {
      const existed = this.sessions.delete(key);
      if (existed) {
        activeSessions.set(this.sessions.size);
        this.log.info({ tenantId, sessionId }, 'Session reset');
      }
      return existed;
    });
  }

  /** Drop sessions idle past the TTL (skipping ones currently locked) */
  reap(now: number = this.now()): number {
    let removed = 0;
    for (const [key, session] of this.sessions) {
      if (now - session.lastActivity > this.ttlMs && !this.mutex.isLocked(key)) {
        this.sessions.delete(key);
        removed++;
      }
    }
    if (removed > 0) {
      activeSessions.set(this.sessions.size);
      this.log.debug({ removed, remaining: this.sessions.size }, 'Reaped idle sessions');
    }
    return removed;
  }

  startReaper(intervalMs: number): void {
    this.stop();
    this.reaper = setInterval(() => this.reap(), intervalMs);
    this.reaper.unref();
  }

  stop(): void {
    if (this.reaper) {
      clearInterval(this.reaper);
      this.reaper = undefined;
    }
  }

  get size(): number {
    return this.sessions.size;
  }

  private fresh(tenantId: string, sessionId: string): Session {
    const now = this.now();
    return {
      sessionId,
      tenantId,
      turnCount: 0,
      leadScore: 1,
      knownFacts: {},
      escalated: false,
      state: 'local',
      recentSentiment: [],
      highValueHits: 0,
      createdAt: now,
      lastActivity: now,
    };
  }
}
