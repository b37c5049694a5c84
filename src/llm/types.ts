// ─── Messages ─────────────────────────────────────────────────────
export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

// ─── Provider Names ───────────────────────────────────────────────
export type LLMProviderName = 'openai' | 'anthropic';

export function isProviderName(value: string): value is LLMProviderName {
  return value === 'openai' || value === 'anthropic';
}

// ─── Provider Configuration ───────────────────────────────────────
export interface LLMProviderConfig {
  apiKey: string;
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
}

// ─── Completion Request / Response ────────────────────────────────
export interface LLMCompletionRequest {
  messages: LLMMessage[];
  temperature?: number;
  maxTokens?: number;
  /** Aborts the in-flight HTTP call */
  signal?: AbortSignal;
}

export interface LLMTokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface LLMCompletionResponse {
  content: string;
  /** Actual model identifier returned by the provider */
  model: string;
  provider: LLMProviderName;
  usage: LLMTokenUsage;
  latencyMs: number;
}

// ─── Provider Interface ───────────────────────────────────────────
export interface LLMProvider {
  readonly name: LLMProviderName;
  readonly model: string;

  /**
   * Send a completion request and return the response.
   * Implementations map the generic message list to provider-specific APIs.
   */
  complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse>;
}

// ─── Model Router Configuration ───────────────────────────────────
export interface ModelRouterConfig {
  primaryProvider: LLMProviderName;
  secondaryProvider?: LLMProviderName;
}
