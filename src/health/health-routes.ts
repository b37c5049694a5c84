import { FastifyInstance } from 'fastify';
import { TenantRegistry } from '../config/tenant-registry';
import { ModelRouter } from '../llm/model-router';
import { ConversationMemory } from '../memory/conversation-memory';
import { getMetrics, getContentType } from '../observability/metrics';

export type RemoteModelStatus = 'disabled' | 'configured' | 'circuit_open';

export interface HealthRouteDeps {
  registry: TenantRegistry;
  memory: ConversationMemory;
  remoteConfigured: boolean;
  /** Provider router behind the remote model, when built from providers */
  modelRouter?: ModelRouter;
  enableMetrics: boolean;
}

export function remoteModelStatus(remoteConfigured: boolean, modelRouter?: ModelRouter): RemoteModelStatus {
  if (!remoteConfigured) return 'disabled';
  return modelRouter?.isFullyOpen() ? 'circuit_open' : 'configured';
}

export function registerHealthRoutes(app: FastifyInstance, deps: HealthRouteDeps): void {
  /** Liveness check: 200 while the process is up; `degraded` while every provider's breaker is open */
  app.get('/health', async (_req, reply) => {
    const remoteModel = remoteModelStatus(deps.remoteConfigured, deps.modelRouter);
    return reply.send({
      status: remoteModel === 'circuit_open' ? 'degraded' : 'ok',
      tenants: deps.registry.list(),
      active_sessions: deps.memory.size,
      remote_model: remoteModel,
      timestamp: new Date().toISOString(),
    });
  });

  /** Prometheus metrics endpoint */
  if (deps.enableMetrics) {
    app.get('/metrics', async (_req, reply) => {
      const metrics = await getMetrics();
      reply.header('Content-Type', getContentType());
      return reply.send(metrics);
    });
  }
}
