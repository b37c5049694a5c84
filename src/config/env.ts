import dotenv from 'dotenv';
import path from 'path';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  if (!val) return fallback;
  const parsed = parseInt(val, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function optionalFloat(key: string, fallback: number): number {
  const val = process.env[key];
  if (!val) return fallback;
  const parsed = parseFloat(val);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function optionalBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (!val) return fallback;
  return val === 'true' || val === '1';
}

export const env = {
  nodeEnv: optional('NODE_ENV', 'development'),
  port: optionalInt('PORT', 3000),
  logLevel: optional('LOG_LEVEL', 'info'),
  projectRoot,

  // ───── Tenants ─────
  tenants: {
    configDir: path.resolve(projectRoot, optional('TENANT_CONFIG_DIR', path.join('config', 'tenants'))),
    defaultTenantId: optional('DEFAULT_TENANT_ID', 'default'),
  },

  // ───── Pipeline ─────
  pipeline: {
    maxMessageLength: optionalInt('MAX_MESSAGE_LENGTH', 2000),
    remoteTimeoutMs: optionalInt('REMOTE_TIMEOUT_MS', 12000),
    embeddingTimeoutMs: optionalInt('EMBEDDING_TIMEOUT_MS', 3000),
  },

  // ───── Session Memory ─────
  session: {
    ttlMinutes: optionalInt('SESSION_TTL_MINUTES', 60),
    reapIntervalSeconds: optionalInt('SESSION_REAP_INTERVAL_SECONDS', 300),
  },

  // ───── LLM Providers ─────
  openai: {
    apiKey: optional('OPENAI_API_KEY', ''),
    model: optional('OPENAI_MODEL', 'gpt-4o-mini'),
    maxTokens: optionalInt('OPENAI_MAX_TOKENS', 800),
    temperature: optionalFloat('OPENAI_TEMPERATURE', 0.5),
    timeoutMs: optionalInt('OPENAI_TIMEOUT_MS', 30000),
  },

  anthropic: {
    apiKey: optional('ANTHROPIC_API_KEY', ''),
    model: optional('ANTHROPIC_MODEL', 'claude-3-5-sonnet-20241022'),
    maxTokens: optionalInt('ANTHROPIC_MAX_TOKENS', 800),
    temperature: optionalFloat('ANTHROPIC_TEMPERATURE', 0.5),
    timeoutMs: optionalInt('ANTHROPIC_TIMEOUT_MS', 30000),
  },

  // ───── LLM Routing ─────
  llm: {
    primaryProvider: optional('LLM_PRIMARY_PROVIDER', 'anthropic'),
    secondaryProvider: optional('LLM_SECONDARY_PROVIDER', ''),
  },

  rag: {
    enabled: optionalBool('RAG_ENABLED', false),
    embeddingModel: optional('RAG_EMBEDDING_MODEL', 'text-embedding-3-small'),
  },

  security: {
    adminApiKey: optional('ADMIN_API_KEY', ''),
  },

  notifications: {
    webhookUrl: optional('NOTIFY_WEBHOOK_URL', ''),
    webhookTimeoutMs: optionalInt('NOTIFY_WEBHOOK_TIMEOUT_MS', 5000),
  },

  observability: {
    enableMetrics: optionalBool('ENABLE_METRICS', true),
  },

  get isDev(): boolean {
    return this.nodeEnv === 'development' || this.nodeEnv === 'test';
  },
  get isProd(): boolean {
    return this.nodeEnv === 'production';
  },
} as const;

export type Env = typeof env;
