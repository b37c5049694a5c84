import { ConversationState, ReplySource } from '../config/types';
import { logger } from '../observability/logger';
import { stateTransitions } from '../observability/metrics';
import { STATE_TRANSITIONS, StateTransitionEvent } from './types';

export class StateMachine {
  private readonly log = logger.child({ component: 'state-machine' });

  /**
   * Attempt a state transition. Returns the new state if valid, or the current state if not.
   */
  transition(
    sessionId: string,
    currentState: ConversationState,
    targetState: ConversationState,
    reason: string,
  ): { newState: ConversationState; event: StateTransitionEvent | null } {
    if (currentState === targetState) {
      return { newState: currentState, event: null };
    }

    const allowed = STATE_TRANSITIONS[currentState];
    if (!allowed.includes(targetState)) {
      this.log.debug({ sessionId, from: currentState, to: targetState, reason }, 'Transition not allowed, keeping state');
      return { newState: currentState, event: null };
    }

    const event: StateTransitionEvent = {
      sessionId,
      from: currentState,
      to: targetState,
      reason,
      timestamp: Date.now(),
    };

    stateTransitions.inc({ from: currentState, to: targetState });
    this.log.info(event, 'State transition');

    return { newState: targetState, event };
  }

  /**
   * Where a message should take the session. Anything the local layers
   * did not answer moves a local session to ai_assisted.
   */
  resolveTargetState(currentState: ConversationState, escalating: boolean, source: ReplySource): ConversationState {
    if (escalating) return 'escalated';
    if (source === 'remote' || source === 'fallback') return 'ai_assisted';
    return currentState;
  }
}

export const stateMachine = new StateMachine();
