import { RemoteModelError } from '../errors';
import { RemoteModel, TurnRecord } from '../orchestrator/types';
import { ModelRouter } from './model-router';
import { LLMMessage } from './types';

/** How much trailing conversation the model sees */
export const REMOTE_HISTORY_TURNS = 8;

export function toLLMMessages(prompt: string, grounding: string, history: readonly TurnRecord[]): LLMMessage[] {
  const system = grounding ? `${prompt}\n\n## Underlag\n${grounding}` : prompt;
  return [
    { role: 'system', content: system },
    ...history.slice(-REMOTE_HISTORY_TURNS).map((turn) => ({ role: turn.role, content: turn.text })),
  ];
}

/** Adapt the provider router to the router's remote-model contract */
export function createRemoteModel(router: ModelRouter): RemoteModel {
  return async (prompt, grounding, history, signal) => {
    const response = await router.complete({ messages: toLLMMessages(prompt, grounding, history), signal });
    const text = response.content.trim();
    if (!text) throw new RemoteModelError('malformed', `Empty reply from ${response.provider}`);
    return text;
  };
}
