import OpenAI from 'openai';
import { LLMProvider, LLMProviderConfig, LLMCompletionRequest, LLMCompletionResponse } from '../types';
import { RemoteModelError } from '../../errors';

const MAX_RETRIES = 1;

/**
 * OpenAI chat completions adapter. Timeouts and retries are left to the
 * SDK; the caller's AbortSignal is passed through as a request option.
 */
export class OpenAIProvider implements LLMProvider {
  readonly name = 'openai' as const;
  readonly model: string;
  private readonly client: OpenAI;

  constructor(private readonly config: LLMProviderConfig) {
    this.model = config.model;
    this.client = new OpenAI({
      apiKey: config.apiKey,
      timeout: config.timeoutMs,
      maxRetries: MAX_RETRIES,
    });
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    const start = Date.now();

    const completion = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: request.messages.map((m) => ({ role: m.role, content: m.content })),
        temperature: request.temperature ?? this.config.temperature,
        max_tokens: request.maxTokens ?? this.config.maxTokens,
      },
      { signal: request.signal },
    );

    const content = completion.choices[0]?.message?.content;
    if (!content) {
      throw new RemoteModelError('malformed', 'OpenAI returned empty response content');
    }

    const usage = completion.usage;

    return {
      content,
      model: completion.model,
      provider: 'openai',
      usage: {
        promptTokens: usage?.prompt_tokens ?? 0,
        completionTokens: usage?.completion_tokens ?? 0,
        totalTokens: usage?.total_tokens ?? 0,
      },
      latencyMs: Date.now() - start,
    };
  }
}
