/**
 * Embedding Service: text embeddings for semantic catalog lookup.
 *
 * Uses the OpenAI embeddings endpoint; catalogs are embedded once at
 * startup, queries once per routed message (under a short timeout).
 */

import { logger } from '../observability/logger';
import { RemoteModelError, toRemoteModelError } from '../errors';

export interface EmbeddingProvider {
  /** Embed a single text string */
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
  /** Batch embed multiple text strings, preserving order */
  embedBatch(texts: readonly string[], signal?: AbortSignal): Promise<number[][]>;
  readonly dimension: number;
}

export interface OpenAIEmbeddingConfig {
  apiKey: string;
  model: string;
  baseUrl?: string;
}

interface EmbeddingResponse {
  data: Array<{ embedding: number[]; index: number }>;
}

function isEmbeddingResponse(value: unknown): value is EmbeddingResponse {
  if (typeof value !== 'object' || value === null || !('data' in value)) return false;
  return Array.isArray(value.data);
}

/**
 * OpenAI-compatible embedding provider (text-embedding-3-small, 1536 dims).
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly dimension = 1536;
  private readonly apiKey: string;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly log = logger.child({ component: 'embedding-service' });

  constructor(config: OpenAIEmbeddingConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.baseUrl = config.baseUrl ?? 'https://api.openai.com/v1';
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const results = await this.embedBatch([text], signal);
    return results[0];
  }

  async embedBatch(texts: readonly string[], signal?: AbortSignal): Promise<number[][]> {
    if (!this.apiKey) {
      throw new RemoteModelError('unavailable', 'OpenAI API key not configured for embeddings');
    }

    const batchSize = 100;
    const allEmbeddings: number[][] = [];

    for (let i = 0; i < texts.length; i += batchSize) {
      const batch = texts.slice(i, i + batchSize);

      let response: Response;
      try {
        response = await fetch(`${this.baseUrl}/embeddings`, {
          method: 'POST',
          headers: {
            'Authorization': `Bearer ${this.apiKey}`,
            'Content-Type': 'application/json',
          },
          body: JSON.stringify({ model: this.model, input: batch }),
          signal,
        });
      } catch (err) {
        throw toRemoteModelError(err);
      }

      if (!response.ok) {
        const errorBody = await response.text();
        this.log.error({ status: response.status, body: errorBody }, 'OpenAI embedding API error');
        throw new RemoteModelError(response.status === 429 ? 'rate_limited' : 'unavailable', `Embedding API error: ${response.status}`);
      }

      const data: unknown = await response.json();
      if (!isEmbeddingResponse(data) || data.data.length !== batch.length) {
        throw new RemoteModelError('malformed', 'Embedding API returned an unexpected payload');
      }

      // Sort by index to maintain order
      const sorted = [...data.data].sort((a, b) => a.index - b.index);
      for (const item of sorted) {
        allEmbeddings.push(item.embedding);
      }
    }

    return allEmbeddings;
  }
}
