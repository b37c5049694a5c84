import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { env } from './config/env';
import { TenantRegistry } from './config/tenant-registry';
import { logger } from './observability/logger';
import { httpRequestDuration } from './observability/metrics';
import { ConversationMemory } from './memory/conversation-memory';
import { Router } from './orchestrator/router';
import { RemoteModel } from './orchestrator/types';
import { buildProviders } from './llm/provider-factory';
import { ModelRouter } from './llm/model-router';
import { createRemoteModel } from './llm/remote-model';
import { isProviderName, LLMProviderName } from './llm/types';
import { EmbeddingProvider, OpenAIEmbeddingProvider } from './knowledge/embedding-service';
import { NotificationBus } from './notifications/notification-bus';
import { LogSink } from './notifications/log-sink';
import { WebhookSink } from './notifications/webhook-sink';
import { NotificationSink } from './notifications/types';
import { registerChatRoutes } from './channels/chat-routes';
import { registerAdminRoutes } from './admin/admin-routes';
import { registerHealthRoutes } from './health/health-routes';

export interface AppOptions {
  registry?: TenantRegistry;
  memory?: ConversationMemory;
  /** `null` disables the remote model; omitted builds one from `modelRouter` or env */
  remote?: RemoteModel | null;
  modelRouter?: ModelRouter;
  embedder?: EmbeddingProvider;
  sinks?: NotificationSink[];
  adminApiKey?: string;
  /** Start the idle-session reaper (default true) */
  reaper?: boolean;
}

export interface AppContext {
  app: FastifyInstance;
  router: Router;
  registry: TenantRegistry;
  memory: ConversationMemory;
  notifications: NotificationBus;
}

/** Provider router from the configured providers, or undefined when none has a key */
function modelRouterFromEnv(): ModelRouter | undefined {
  const providers = buildProviders(env);
  const available = [...providers.keys()];
  if (available.length === 0) return undefined;

  const configured = env.llm.primaryProvider;
  const primary: LLMProviderName =
    isProviderName(configured) && providers.has(configured) ? configured : available[0];
  const secondary = isProviderName(env.llm.secondaryProvider) ? env.llm.secondaryProvider : undefined;

  return new ModelRouter({ primaryProvider: primary, secondaryProvider: secondary }, providers);
}

function embedderFromEnv(): EmbeddingProvider | undefined {
  if (!env.rag.enabled || !env.openai.apiKey) return undefined;
  return new OpenAIEmbeddingProvider({ apiKey: env.openai.apiKey, model: env.rag.embeddingModel });
}

function sinksFromEnv(): NotificationSink[] {
  const sinks: NotificationSink[] = [new LogSink()];
  if (env.notifications.webhookUrl) {
    sinks.push(new WebhookSink({ url: env.notifications.webhookUrl, timeoutMs: env.notifications.webhookTimeoutMs }));
  }
  return sinks;
}

export async function buildApp(options: AppOptions = {}): Promise<AppContext> {
  const app = Fastify({
    logger: false, // We use our own Pino logger
    trustProxy: true,
    bodyLimit: 65_536,
  });

  await app.register(cors, {
    origin: true,
    methods: ['GET', 'POST'],
  });

  // Request timing
  app.addHook('onResponse', (req, reply, done) => {
    const route = req.routeOptions?.url ?? req.url;
    httpRequestDuration.observe(
      { method: req.method, route, status_code: String(reply.statusCode) },
      reply.elapsedTime / 1000,
    );
    done();
  });

  // ───── Tenants ─────
  const registry = options.registry ?? new TenantRegistry({ configDir: env.tenants.configDir });
  registry.preload();

  // ───── Session memory ─────
  const memory = options.memory ?? new ConversationMemory({ ttlMs: env.session.ttlMinutes * 60_000 });
  if (options.reaper ?? true) memory.startReaper(env.session.reapIntervalSeconds * 1000);

  // ───── Remote model + embeddings ─────
  const modelRouter = options.remote === undefined ? options.modelRouter ?? modelRouterFromEnv() : undefined;
  const remote = modelRouter ? createRemoteModel(modelRouter) : options.remote ?? undefined;
  const embedder = options.embedder ?? embedderFromEnv();
  if (embedder) {
    for (const tenantId of registry.list()) {
      void registry.warmEmbeddings(tenantId, embedder).catch((err: unknown) => {
        logger.warn({ err, tenantId }, 'Catalog embedding failed; keyword lookup only');
      });
    }
  }

  // ───── Notifications ─────
  const notifications = new NotificationBus(options.sinks ?? sinksFromEnv());

  const router = new Router({
    tenants: registry,
    memory,
    remote,
    embedder,
    notifications,
    limits: env.pipeline,
  });

  // ───── Routes ─────
  registerHealthRoutes(app, {
    registry,
    memory,
    remoteConfigured: remote !== undefined,
    modelRouter,
    enableMetrics: env.observability.enableMetrics,
  });
  registerChatRoutes(app, { router, tenants: registry, memory, defaultTenantId: env.tenants.defaultTenantId });
  registerAdminRoutes(app, { registry, adminApiKey: options.adminApiKey ?? env.security.adminApiKey });

  app.addHook('onClose', async () => {
    memory.stop();
    await notifications.flush();
  });

  logger.info(
    { tenants: registry.list(), remoteModel: remote !== undefined, rag: embedder !== undefined },
    'Application built',
  );

  return { app, router, registry, memory, notifications };
}
