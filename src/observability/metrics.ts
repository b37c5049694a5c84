import client from 'prom-client';

export const registry = new client.Registry();

client.collectDefaultMetrics({ register: registry, prefix: 'tsr_' });

// ───── Router ─────
export const messagesProcessed = new client.Counter({
  name: 'tsr_messages_processed_total',
  help: 'Messages routed, by reply source and resulting action',
  labelNames: ['tenant', 'source', 'action'] as const,
  registers: [registry],
});

export const routerDuration = new client.Histogram({
  name: 'tsr_router_duration_seconds',
  help: 'End-to-end process() latency',
  labelNames: ['source'] as const,
  buckets: [0.005, 0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10, 15],
  registers: [registry],
});

export const validationFailures = new client.Counter({
  name: 'tsr_validation_failures_total',
  help: 'Messages rejected before routing',
  labelNames: ['code'] as const,
  registers: [registry],
});

// ───── Escalation ─────
export const escalations = new client.Counter({
  name: 'tsr_escalations_total',
  help: 'Escalation decisions by priority and kind',
  labelNames: ['decision', 'priority', 'rule'] as const,
  registers: [registry],
});

export const stateTransitions = new client.Counter({
  name: 'tsr_state_transitions_total',
  help: 'Session state machine transitions',
  labelNames: ['from', 'to'] as const,
  registers: [registry],
});

// ───── Remote model ─────
export const remoteModelFailures = new client.Counter({
  name: 'tsr_remote_model_failures_total',
  help: 'Remote model calls that fell back to the deterministic reply',
  labelNames: ['reason'] as const,
  registers: [registry],
});

export const llmRequestDuration = new client.Histogram({
  name: 'tsr_llm_request_duration_seconds',
  help: 'LLM provider request latency',
  labelNames: ['provider', 'model', 'status'] as const,
  buckets: [0.1, 0.25, 0.5, 1, 2, 4, 8, 12, 20],
  registers: [registry],
});

export const llmProviderFailovers = new client.Counter({
  name: 'tsr_llm_provider_failovers_total',
  help: 'Requests served by a lower-priority provider',
  labelNames: ['from_provider', 'to_provider', 'reason'] as const,
  registers: [registry],
});

export const llmTokenUsage = new client.Counter({
  name: 'tsr_llm_tokens_total',
  help: 'Token usage reported by providers',
  labelNames: ['provider', 'model', 'token_type'] as const,
  registers: [registry],
});

// ───── Memory / notifications / HTTP ─────
export const activeSessions = new client.Gauge({
  name: 'tsr_active_sessions',
  help: 'Sessions currently held in memory',
  registers: [registry],
});

export const notificationsDelivered = new client.Counter({
  name: 'tsr_notifications_total',
  help: 'Notification deliveries by sink and outcome',
  labelNames: ['kind', 'sink', 'status'] as const,
  registers: [registry],
});

export const httpRequestDuration = new client.Histogram({
  name: 'tsr_http_request_duration_seconds',
  help: 'HTTP request latency',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.005, 0.01, 0.05, 0.1, 0.5, 1, 5, 15],
  registers: [registry],
});

export async function getMetrics(): Promise<string> {
  return registry.metrics();
}

export function getContentType(): string {
  return registry.contentType;
}
