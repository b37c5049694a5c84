import Anthropic from '@anthropic-ai/sdk';
import { LLMMessage, LLMProvider, LLMProviderConfig, LLMCompletionRequest, LLMCompletionResponse } from '../types';
import { RemoteModelError } from '../../errors';

/**
 * Anthropic messages adapter.
 *
 * Differences from OpenAI:
 * 1. System messages go in the separate `system` parameter.
 * 2. Roles must alternate, so consecutive same-role messages are merged.
 * 3. The first message must come from the user.
 */
export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic' as const;
  readonly model: string;
  private readonly client: Anthropic;

  constructor(private readonly config: LLMProviderConfig) {
    this.model = config.model;
    this.client = new Anthropic({
      apiKey: config.apiKey,
      timeout: config.timeoutMs,
    });
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    const start = Date.now();

    let systemPrompt = '';
    const conversation: LLMMessage[] = [];
    for (const msg of request.messages) {
      if (msg.role === 'system') {
        systemPrompt += (systemPrompt ? '\n\n' : '') + msg.content;
      } else {
        conversation.push(msg);
      }
    }

    const claudeMessages: Array<{ role: 'user' | 'assistant'; content: string }> = mergeConsecutiveRoles(
      conversation,
    ).map((m) => ({
      role: m.role === 'assistant' ? 'assistant' : 'user',
      content: m.content,
    }));

    if (claudeMessages.length === 0 || claudeMessages[0].role !== 'user') {
      claudeMessages.unshift({ role: 'user', content: '(conversation start)' });
    }

    const response = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: request.maxTokens ?? this.config.maxTokens,
        temperature: request.temperature ?? this.config.temperature,
        system: systemPrompt || undefined,
        messages: claudeMessages,
      },
      { signal: request.signal },
    );

    const textBlock = response.content.find((block) => block.type === 'text');
    if (!textBlock || textBlock.type !== 'text' || !textBlock.text.trim()) {
      throw new RemoteModelError('malformed', 'Anthropic returned no text content');
    }

    return {
      content: textBlock.text,
      model: response.model,
      provider: 'anthropic',
      usage: {
        promptTokens: response.usage.input_tokens,
        completionTokens: response.usage.output_tokens,
        totalTokens: response.usage.input_tokens + response.usage.output_tokens,
      },
      latencyMs: Date.now() - start,
    };
  }
}

/** Claude requires strict user/assistant alternation */
export function mergeConsecutiveRoles(messages: readonly LLMMessage[]): LLMMessage[] {
  const merged: LLMMessage[] = [];
  for (const msg of messages) {
    const prev = merged[merged.length - 1];
    if (prev && prev.role === msg.role) {
      prev.content += '\n\n' + msg.content;
    } else {
      merged.push({ ...msg });
    }
  }
  return merged;
}
