import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { TenantRegistry } from '../config/tenant-registry';
import { RouterError, TenantNotFoundError } from '../errors';
import { logger } from '../observability/logger';

export interface AdminRouteDeps {
  registry: TenantRegistry;
  /** Empty disables every admin route */
  adminApiKey: string;
}

function verifyAdminKey(req: FastifyRequest, reply: FastifyReply, adminApiKey: string): boolean {
  const key = req.headers['x-admin-api-key'];
  if (!adminApiKey || typeof key !== 'string' || key !== adminApiKey) {
    reply.status(403).send({ error: 'Forbidden' });
    return false;
  }
  return true;
}

export function registerAdminRoutes(app: FastifyInstance, deps: AdminRouteDeps): void {
  const log = logger.child({ component: 'admin' });

  /** Re-read one tenant file and swap it in; the old context stays on failure */
  app.post<{ Params: { tenantId: string } }>('/admin/tenants/:tenantId/reload', async (req, reply) => {
    if (!verifyAdminKey(req, reply, deps.adminApiKey)) return reply;

    const { tenantId } = req.params;
    try {
      const context = deps.registry.reload(tenantId);
      log.info({ tenantId, admin: true }, 'Tenant reloaded');
      return reply.send({
        status: 'ok',
        tenant_id: context.tenantId,
        patterns: context.patterns.size,
        knowledge_entries: context.catalog.size,
        escalation_rules: context.escalation.ruleIds(),
      });
    } catch (err) {
      if (err instanceof TenantNotFoundError) {
        return reply.status(404).send({ error: err.code, message: err.message });
      }
      log.error({ err, tenantId }, 'Tenant reload failed');
      return reply.status(422).send({
        error: err instanceof RouterError ? err.code : 'RELOAD_FAILED',
        message: err instanceof Error ? err.message : String(err),
      });
    }
  });

  /** Loaded tenant ids */
  app.get('/admin/tenants', async (req, reply) => {
    if (!verifyAdminKey(req, reply, deps.adminApiKey)) return reply;
    return reply.send({ tenants: deps.registry.list() });
  });
}
