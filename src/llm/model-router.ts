import { LLMProvider, LLMProviderName, LLMCompletionRequest, LLMCompletionResponse, ModelRouterConfig } from './types';
import { RemoteModelError, toRemoteModelError } from '../errors';
import { logger } from '../observability/logger';
import { llmRequestDuration, llmProviderFailovers, llmTokenUsage } from '../observability/metrics';

export const CIRCUIT_BREAKER_THRESHOLD = 5;
export const CIRCUIT_BREAKER_RESET_MS = 60_000;

interface CircuitBreakerState {
  failures: number;
  openUntil: number;
}

/**
 * Sends completions down a priority chain of providers (primary, then
 * secondary) with a per-provider circuit breaker. An aborted request is
 * not retried on the next provider.
 */
export class ModelRouter {
  private readonly circuitBreakers = new Map<LLMProviderName, CircuitBreakerState>();
  private readonly log = logger.child({ component: 'model-router' });

  constructor(
    private readonly config: ModelRouterConfig,
    private readonly providers: Map<LLMProviderName, LLMProvider>,
    private readonly now: () => number = Date.now,
  ) {
    this.log.info(
      {
        primary: config.primaryProvider,
        secondary: config.secondaryProvider,
        availableProviders: Array.from(providers.keys()),
      },
      'Model router initialized',
    );
  }

  get available(): boolean {
    return this.providerOrder().length > 0;
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    const providerOrder = this.providerOrder();
    if (providerOrder.length === 0) {
      throw new RemoteModelError('unavailable', 'No LLM provider configured');
    }

    let lastError: RemoteModelError | undefined;
    let previous: LLMProviderName | undefined;

    for (const providerName of providerOrder) {
      const provider = this.providers.get(providerName);
      if (!provider) continue;

      const cb = this.circuitBreakers.get(providerName);
      if (cb && this.now() < cb.openUntil) {
        this.log.debug({ provider: providerName }, 'Circuit breaker open, skipping');
        continue;
      }

      const timer = llmRequestDuration.startTimer({ provider: providerName, model: provider.model });

      try {
        const response = await provider.complete(request);

        this.resetCircuitBreaker(providerName);
        timer({ status: 'success' });

        llmTokenUsage.inc(
          { provider: providerName, model: response.model, token_type: 'prompt' },
          response.usage.promptTokens,
        );
        llmTokenUsage.inc(
          { provider: providerName, model: response.model, token_type: 'completion' },
          response.usage.completionTokens,
        );

        if (previous && lastError) {
          llmProviderFailovers.inc({ from_provider: previous, to_provider: providerName, reason: lastError.reason });
          this.log.info({ from: previous, to: providerName }, 'Successful failover to secondary provider');
        }

        return response;
      } catch (err) {
        timer({ status: 'error' });
        lastError = toRemoteModelError(err);

        if (request.signal?.aborted) throw lastError;

        this.recordFailure(providerName);
        this.log.warn({ provider: providerName, reason: lastError.reason, err: lastError.message }, 'Provider failed, trying next');
        previous = providerName;
      }
    }

    throw lastError ?? new RemoteModelError('unavailable', 'All LLM providers are circuit-broken');
  }

  /** True when every configured provider has an open breaker */
  isFullyOpen(): boolean {
    const now = this.now();
    for (const name of this.providerOrder()) {
      const cb = this.circuitBreakers.get(name);
      if (!cb || now >= cb.openUntil) return false;
    }
    return this.providerOrder().length > 0;
  }

  // ─── Private ──────────────────────────────────────────────────

  private providerOrder(): LLMProviderName[] {
    const order: LLMProviderName[] = [this.config.primaryProvider];
    if (this.config.secondaryProvider && this.config.secondaryProvider !== this.config.primaryProvider) {
      order.push(this.config.secondaryProvider);
    }
    return order.filter((name) => this.providers.has(name));
  }

  private recordFailure(provider: LLMProviderName): void {
    const cb = this.circuitBreakers.get(provider) ?? { failures: 0, openUntil: 0 };
    cb.failures++;

    if (cb.failures >= CIRCUIT_BREAKER_THRESHOLD) {
      cb.openUntil = this.now() + CIRCUIT_BREAKER_RESET_MS;
      this.log.error(
        { provider, failures: cb.failures, resetMs: CIRCUIT_BREAKER_RESET_MS },
        'Circuit breaker opened for provider',
      );
    }

    this.circuitBreakers.set(provider, cb);
  }

  private resetCircuitBreaker(provider: LLMProviderName): void {
    const cb = this.circuitBreakers.get(provider);
    if (cb) {
      cb.failures = 0;
      cb.openUntil = 0;
    }
  }
}
