import { OpenAIProvider } from '../../src/llm/providers/openai-provider';
import { AnthropicProvider } from '../../src/llm/providers/anthropic-provider';
import { buildProviders } from '../../src/llm/provider-factory';
import { RemoteModelError } from '../../src/errors';
import { LLMProviderConfig } from '../../src/llm/types';

const mockChatCreate = jest.fn();
const mockMessagesCreate = jest.fn();

// Mock both SDKs to avoid real API calls
jest.mock('openai', () => {
  return jest.fn().mockImplementation(() => ({
    chat: { completions: { create: mockChatCreate } },
  }));
});

jest.mock('@anthropic-ai/sdk', () => {
  return jest.fn().mockImplementation(() => ({
    messages: { create: mockMessagesCreate },
  }));
});

const config: LLMProviderConfig = {
  apiKey: 'test-secret',
  model: 'test-model',
  maxTokens: 200,
  temperature: 0.2,
  timeoutMs: 1000,
};

beforeEach(() => {
  mockChatCreate.mockReset();
  mockMessagesCreate.mockReset();
});

describe('OpenAIProvider', () => {
  it('should map messages and usage', async () => {
    mockChatCreate.mockResolvedValue({
      model: 'test-model-2024',
      choices: [{ message: { content: 'Svar från modellen' } }],
      usage: { prompt_tokens: 12, completion_tokens: 4, total_tokens: 16 },
    });

    const provider = new OpenAIProvider(config);
    const controller = new AbortController();
    const response = await provider.complete({
      messages: [
        { role: 'system', content: 'Du är en assistent.' },
        { role: 'user', content: 'Hej' },
      ],
      signal: controller.signal,
    });

    expect(response.content).toBe('Svar från modellen');
    expect(response.model).toBe('test-model-2024');
    expect(response.provider).toBe('openai');
    expect(response.usage).toEqual({ promptTokens: 12, completionTokens: 4, totalTokens: 16 });

    expect(mockChatCreate).toHaveBeenCalledWith(
      {
        model: 'test-model',
        messages: [
          { role: 'system', content: 'Du är en assistent.' },
          { role: 'user', content: 'Hej' },
        ],
        temperature: 0.2,
        max_tokens: 200,
      },
      { signal: controller.signal },
    );
  });

  it('should reject empty content as malformed', async () => {
    mockChatCreate.mockResolvedValue({ model: 'test-model', choices: [{ message: { content: '' } }] });

    const provider = new OpenAIProvider(config);
    const error = await provider.complete({ messages: [{ role: 'user', content: 'Hej' }] }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RemoteModelError);
    expect(error).toMatchObject({ reason: 'malformed' });
  });
});

describe('AnthropicProvider', () => {
  it('should move system text aside and start with a user turn', async () => {
    mockMessagesCreate.mockResolvedValue({
      model: 'test-model',
      content: [{ type: 'text', text: 'Hej där' }],
      usage: { input_tokens: 20, output_tokens: 3 },
    });

    const provider = new AnthropicProvider(config);
    const response = await provider.complete({
      messages: [
        { role: 'system', content: 'Regel ett' },
        { role: 'system', content: 'Regel två' },
        { role: 'assistant', content: 'Välkommen' },
        { role: 'user', content: 'Fråga' },
      ],
    });

    expect(response.content).toBe('Hej där');
    expect(response.usage.totalTokens).toBe(23);

    const [params] = mockMessagesCreate.mock.calls[0];
    expect(params.system).toBe('Regel ett\n\nRegel två');
    expect(params.messages).toEqual([
      { role: 'user', content: '(conversation start)' },
      { role: 'assistant', content: 'Välkommen' },
      { role: 'user', content: 'Fråga' },
    ]);
  });

  it('should reject a reply without text blocks', async () => {
    mockMessagesCreate.mockResolvedValue({
      model: 'test-model',
      content: [],
      usage: { input_tokens: 1, output_tokens: 0 },
    });

    const provider = new AnthropicProvider(config);
    await expect(provider.complete({ messages: [{ role: 'user', content: 'Hej' }] })).rejects.toThrow(
      'Anthropic returned no text content',
    );
  });
});

describe('buildProviders', () => {
  it('should only build providers that have an API key', () => {
    const providers = buildProviders({ openai: { ...config, apiKey: '' }, anthropic: config });
    expect([...providers.keys()]).toEqual(['anthropic']);
  });

  it('should return an empty map when no key is set', () => {
    const providers = buildProviders({ openai: { ...config, apiKey: '' }, anthropic: { ...config, apiKey: '' } });
    expect(providers.size).toBe(0);
  });
});
