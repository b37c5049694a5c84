import { LLMProvider, LLMProviderName, LLMProviderConfig } from './types';
import { OpenAIProvider } from './providers/openai-provider';
import { AnthropicProvider } from './providers/anthropic-provider';
import { logger } from '../observability/logger';

export function createProvider(name: LLMProviderName, config: LLMProviderConfig): LLMProvider {
  switch (name) {
    case 'openai':
      return new OpenAIProvider(config);
    case 'anthropic':
      return new AnthropicProvider(config);
  }
}

/**
 * Build every provider whose API key is set. An empty map is valid: the
 * router then answers from local layers and the fallback reply only.
 */
export function buildProviders(envConfig: {
  openai: LLMProviderConfig;
  anthropic: LLMProviderConfig;
}): Map<LLMProviderName, LLMProvider> {
  const providers = new Map<LLMProviderName, LLMProvider>();
  const log = logger.child({ component: 'provider-factory' });

  if (envConfig.openai.apiKey) {
    providers.set('openai', createProvider('openai', envConfig.openai));
    log.info({ model: envConfig.openai.model }, 'OpenAI provider initialized');
  }

  if (envConfig.anthropic.apiKey) {
    providers.set('anthropic', createProvider('anthropic', envConfig.anthropic));
    log.info({ model: envConfig.anthropic.model }, 'Anthropic provider initialized');
  }

  if (providers.size === 0) {
    log.warn('No LLM provider configured (OPENAI_API_KEY, ANTHROPIC_API_KEY); remote answers disabled');
  }

  return providers;
}
