import { logger } from '../observability/logger';

export interface GuardVerdict {
  flagged: boolean;
  /** Name of the first pattern that matched */
  pattern?: string;
}

const INJECTION_PATTERNS: ReadonlyArray<{ name: string; regex: RegExp }> = Object.freeze([
  { name: 'override_instructions', regex: /\b(ignore|forget|disregard)\b.{0,40}\b(previous|above|all|earlier)\b.{0,20}\b(instructions|rules|prompt)/iu },
  { name: 'bypass_rules', regex: /\b(override|bypass|circumvent)\b.{0,30}\b(system|instructions|rules|filters)\b/iu },
  { name: 'role_swap', regex: /\b(you are now|you're now|act as|pretend (to be|you are)|roleplay as)\b/iu },
  { name: 'prompt_extraction', regex: /\b(show|reveal|print|repeat|dump|leak)\b.{0,30}\b(system prompt|your instructions|your prompt|system message)/iu },
  { name: 'jailbreak', regex: /\b(jailbreak|developer mode|dan mode|no restrictions|unrestricted mode)\b/iu },
  { name: 'override_instructions_sv', regex: /(ignorera|glöm|strunta i).{0,40}(tidigare|alla|ovanstående).{0,20}(instruktioner|regler)/iu },
  { name: 'prompt_extraction_sv', regex: /(visa|berätta|avslöja|skriv ut).{0,30}(systemprompt|dina instruktioner|dina regler)/iu },
  { name: 'role_swap_sv', regex: /(du är nu|låtsas att du är|agera som)/iu },
]);

/**
 * Flags messages that try to steer the remote model. A flagged message is
 * still answered locally; it just never reaches the model.
 */
export class PromptGuard {
  private readonly log = logger.child({ component: 'prompt-guard' });

  constructor(private readonly patterns = INJECTION_PATTERNS) {}

  inspect(text: string, sessionId?: string): GuardVerdict {
    for (const { name, regex } of this.patterns) {
      if (regex.test(text)) {
        this.log.warn({ sessionId, pattern: name }, 'Prompt injection attempt');
        return { flagged: true, pattern: name };
      }
    }
    return { flagged: false };
  }

  /** Client-supplied history without the user turns that would be flagged */
  screenHistory<T extends { role: string; text: string }>(turns: readonly T[], sessionId?: string): T[] {
    return turns.filter((turn) => turn.role !== 'user' || !this.inspect(turn.text, sessionId).flagged);
  }
}

// ─── Output side ──────────────────────────────────────────────────

const LEAK_MARKERS: ReadonlyArray<{ name: string; regex: RegExp }> = Object.freeze([
  { name: 'system_prompt', regex: /system\s*prompt\s*:/giu },
  { name: 'instructions', regex: /\binstructions\s*:/giu },
  { name: 'as_an_ai', regex: /\bas an ai( language model)?,?/giu },
  { name: 'told_to', regex: /\bi was (told|instructed) to\b/giu },
  { name: 'system_prompt_sv', regex: /systemprompt(en)?\s*:/giu },
  { name: 'instructions_sv', regex: /\binstruktioner\s*:/giu },
  { name: 'as_an_ai_sv', regex: /\bsom (en )?ai(-assistent| språkmodell)?,/giu },
  { name: 'told_to_sv', regex: /\bjag (har blivit|blev) (instruerad|tillsagd) att\b/giu },
]);

export interface SanitizedReply {
  text: string;
  /** Names of the markers that were removed */
  removed: string[];
}

/** Strips prompt-leak markers from remote model replies before they reach the customer */
export class ReplySanitizer {
  private readonly log = logger.child({ component: 'reply-sanitizer' });

  constructor(private readonly markers = LEAK_MARKERS) {}

  sanitize(reply: string, sessionId?: string): SanitizedReply {
    let text = reply;
    const removed: string[] = [];
    for (const { name, regex } of this.markers) {
      const next = text.replace(regex, '');
      if (next !== text) {
        removed.push(name);
        text = next;
      }
    }
    if (removed.length > 0) {
      this.log.warn({ sessionId, removed }, 'Prompt-leak markers removed from reply');
      text = text.replace(/[ \t]{2,}/g, ' ').replace(/^[ \t]+/gm, '');
    }
    return { text: text.trim(), removed };
  }
}
