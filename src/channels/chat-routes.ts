import { FastifyInstance } from 'fastify';
import { TenantSource } from '../config/tenant-registry';
import { RouterError, TenantNotFoundError, ValidationError } from '../errors';
import { ConversationMemory } from '../memory/conversation-memory';
import { logger } from '../observability/logger';
import { Router } from '../orchestrator/router';
import { RouterResult, TurnRecord } from '../orchestrator/types';

interface HistoryItem {
  role: 'user' | 'assistant';
  content: string;
  timestamp?: number;
}

interface ChatBody {
  message: string;
  session_id: string;
  tenant_id?: string;
  conversation_history?: HistoryItem[];
}

const chatBodySchema = {
  type: 'object',
  required: ['message', 'session_id'],
  additionalProperties: false,
  properties: {
    message: { type: 'string' },
    session_id: { type: 'string', minLength: 1, maxLength: 200 },
    tenant_id: { type: 'string', minLength: 1, maxLength: 100 },
    conversation_history: {
      type: 'array',
      maxItems: 50,
      items: {
        type: 'object',
        required: ['role', 'content'],
        additionalProperties: false,
        properties: {
          role: { type: 'string', enum: ['user', 'assistant'] },
          content: { type: 'string' },
          timestamp: { type: 'number' },
        },
      },
    },
  },
} as const;

const GENERIC_FAILURE_REPLY = 'Något gick fel hos oss. Försök igen om en stund eller kontakta oss per telefon eller e-post.';

export interface ChatRouteDeps {
  router: Router;
  tenants: TenantSource;
  memory: ConversationMemory;
  defaultTenantId: string;
}

/** Wire format of a RouterResult */
export function serializeResult(result: RouterResult, sessionId: string) {
  return {
    session_id: sessionId,
    reply_text: result.replyText,
    intent: result.intent,
    confidence: result.confidence,
    sentiment: result.sentiment,
    lead_score: result.leadScore,
    action: result.action,
    suggested_followups: [...result.suggestedFollowups],
  };
}

function toTurns(items: readonly HistoryItem[] = []): TurnRecord[] {
  return items.map((item) => ({ role: item.role, text: item.content, timestamp: item.timestamp ?? 0 }));
}

export function registerChatRoutes(app: FastifyInstance, deps: ChatRouteDeps): void {
  const log = logger.child({ component: 'chat-routes' });

  /**
   * POST /chat
   * Routes one message and returns the structured reply.
   */
  app.post<{ Body: ChatBody }>('/chat', { schema: { body: chatBodySchema } }, async (req, reply) => {
    const body = req.body;
    const tenantId = body.tenant_id ?? deps.defaultTenantId;

    // Client went away: abort the remote call and skip the commit
    const controller = new AbortController();
    reply.raw.on('close', () => {
      if (!reply.raw.writableFinished) controller.abort();
    });

    try {
      const result = await deps.router.process(
        {
          text: body.message,
          sessionId: body.session_id,
          tenantId,
          history: toTurns(body.conversation_history),
        },
        { signal: controller.signal, requestId: req.id },
      );
      return reply.send(serializeResult(result, body.session_id));
    } catch (err) {
      if (err instanceof ValidationError) {
        return reply.status(400).send({ error: err.code, issue: err.issue, message: err.message });
      }
      if (err instanceof TenantNotFoundError) {
        return reply.status(404).send({ error: err.code, message: err.message });
      }

      log.error({ err, tenantId, sessionId: body.session_id }, 'Chat request failed');
      return reply.status(500).send({
        error: err instanceof RouterError ? err.code : 'INTERNAL_ERROR',
        reply_text: fallbackText(deps.tenants, tenantId),
      });
    }
  });

  /** POST /sessions/:sessionId/reset: forget a conversation */
  app.post<{ Params: { sessionId: string }; Querystring: { tenant_id?: string } }>(
    '/sessions/:sessionId/reset',
    async (req, reply) => {
      const tenantId = req.query.tenant_id ?? deps.defaultTenantId;
      const existed = await deps.memory.reset(tenantId, req.params.sessionId);
      return reply.send({ status: 'ok', session_id: req.params.sessionId, existed });
    },
  );
}

function fallbackText(tenants: TenantSource, tenantId: string): string {
  try {
    return tenants.getOrCreate(tenantId).templates.fallback;
  } catch (err) {
    logger.debug({ err, tenantId }, 'No tenant fallback available, using generic reply');
    return GENERIC_FAILURE_REPLY;
  }
}
