import { RemoteModelError } from '../../src/errors';
import { remoteModelStatus } from '../../src/health/health-routes';
import { CIRCUIT_BREAKER_RESET_MS, CIRCUIT_BREAKER_THRESHOLD, ModelRouter } from '../../src/llm/model-router';
import { mergeConsecutiveRoles } from '../../src/llm/providers/anthropic-provider';
import { REMOTE_HISTORY_TURNS, createRemoteModel, toLLMMessages } from '../../src/llm/remote-model';
import { LLMCompletionRequest, LLMCompletionResponse, LLMProvider, LLMProviderName } from '../../src/llm/types';
import { TurnRecord } from '../../src/orchestrator/types';

class FakeProvider implements LLMProvider {
  readonly model = 'fake-model';
  calls = 0;
  failWith?: unknown;
  reply = 'Svar från modellen';

  constructor(readonly name: LLMProviderName) {}

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    this.calls++;
    if (this.failWith !== undefined) throw this.failWith;
    return {
      content: this.reply,
      model: this.model,
      provider: this.name,
      usage: { promptTokens: request.messages.length, completionTokens: 3, totalTokens: request.messages.length + 3 },
      latencyMs: 1,
    };
  }
}

const request: LLMCompletionRequest = { messages: [{ role: 'user', content: 'Hej' }] };

function setup(withSecondary = true) {
  let clock = 0;
  const primary = new FakeProvider('anthropic');
  const secondary = new FakeProvider('openai');
  const providers = new Map<LLMProviderName, LLMProvider>([['anthropic', primary]]);
  if (withSecondary) providers.set('openai', secondary);
  const router = new ModelRouter(
    { primaryProvider: 'anthropic', secondaryProvider: 'openai' },
    providers,
    () => clock,
  );
  return { router, primary, secondary, advance: (ms: number) => (clock += ms) };
}

describe('ModelRouter', () => {
  it('uses the primary provider when it answers', async () => {
    const { router, primary, secondary } = setup();
    const response = await router.complete(request);
    expect(response.provider).toBe('anthropic');
    expect(primary.calls).toBe(1);
    expect(secondary.calls).toBe(0);
  });

  it('fails over to the secondary provider', async () => {
    const { router, primary } = setup();
    primary.failWith = Object.assign(new Error('overloaded'), { status: 529 });
    const response = await router.complete(request);
    expect(response.provider).toBe('openai');
  });

  it('throws the last provider error when every provider fails', async () => {
    const { router, primary, secondary } = setup();
    primary.failWith = new Error('down');
    secondary.failWith = Object.assign(new Error('slow down'), { status: 429 });
    await expect(router.complete(request)).rejects.toMatchObject({ reason: 'rate_limited' });
  });

  it('does not try the next provider once the caller aborted', async () => {
    const { router, primary, secondary } = setup();
    const controller = new AbortController();
    controller.abort();
    primary.failWith = new RemoteModelError('failed', 'aborted');
    await expect(router.complete({ ...request, signal: controller.signal })).rejects.toThrow('aborted');
    expect(secondary.calls).toBe(0);
  });

  it('opens the circuit after repeated failures and closes it after the reset window', async () => {
    const { router, primary, advance } = setup(false);
    primary.failWith = new Error('down');
    for (let i = 0; i < CIRCUIT_BREAKER_THRESHOLD; i++) {
      await expect(router.complete(request)).rejects.toThrow('down');
    }
    expect(router.isFullyOpen()).toBe(true);

    await expect(router.complete(request)).rejects.toMatchObject({ reason: 'unavailable' });
    expect(primary.calls).toBe(CIRCUIT_BREAKER_THRESHOLD);

    advance(CIRCUIT_BREAKER_RESET_MS);
    primary.failWith = undefined;
    await expect(router.complete(request)).resolves.toMatchObject({ provider: 'anthropic' });
    expect(router.isFullyOpen()).toBe(false);
  });

  it('reports unavailable with no providers', async () => {
    const router = new ModelRouter({ primaryProvider: 'openai' }, new Map<LLMProviderName, LLMProvider>());
    expect(router.available).toBe(false);
    await expect(router.complete(request)).rejects.toMatchObject({ reason: 'unavailable' });
  });
});

describe('remoteModelStatus', () => {
  it('reports disabled without a remote model', () => {
    expect(remoteModelStatus(false)).toBe('disabled');
  });

  it('reports configured while a provider is reachable', () => {
    expect(remoteModelStatus(true, setup().router)).toBe('configured');
    expect(remoteModelStatus(true)).toBe('configured');
  });

  it('reports an open circuit once every provider is tripped', async () => {
    const { router, primary } = setup(false);
    primary.failWith = new Error('down');
    for (let i = 0; i < CIRCUIT_BREAKER_THRESHOLD; i++) {
      await expect(router.complete(request)).rejects.toThrow('down');
    }
    expect(remoteModelStatus(true, router)).toBe('circuit_open');
  });
});

describe('remote model adapter', () => {
  const history: TurnRecord[] = Array.from({ length: 10 }, (_, i): TurnRecord => ({
    role: i % 2 === 0 ? 'user' : 'assistant',
    text: `tur ${i}`,
    timestamp: i,
  }));

  it('puts prompt and grounding in the system message and trims history', () => {
    const messages = toLLMMessages('Du är en assistent.', '- Fråga\n  Svar', history);
    expect(messages[0]).toEqual({ role: 'system', content: 'Du är en assistent.\n\n## Underlag\n- Fråga\n  Svar' });
    expect(messages).toHaveLength(REMOTE_HISTORY_TURNS + 1);
    expect(messages[1]).toEqual({ role: 'user', content: 'tur 2' });
  });

  it('leaves out the grounding section when there is none', () => {
    expect(toLLMMessages('Prompt', '', [])).toEqual([{ role: 'system', content: 'Prompt' }]);
  });

  it('returns the trimmed reply and rejects an empty one', async () => {
    const { router, primary } = setup(false);
    primary.reply = '  Hej!  ';
    const remote = createRemoteModel(router);
    await expect(remote('p', '', history)).resolves.toBe('Hej!');

    primary.reply = '   ';
    await expect(remote('p', '', history)).rejects.toMatchObject({ reason: 'malformed' });
  });
});

describe('mergeConsecutiveRoles', () => {
  it('joins adjacent turns from the same speaker', () => {
    expect(
      mergeConsecutiveRoles([
        { role: 'user', content: 'Hej' },
        { role: 'user', content: 'Är ni där?' },
        { role: 'assistant', content: 'Ja' },
      ]),
    ).toEqual([
      { role: 'user', content: 'Hej\n\nÄr ni där?' },
      { role: 'assistant', content: 'Ja' },
    ]);
  });
});
