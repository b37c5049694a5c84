/**
 * In-memory vector index over a tenant's knowledge entries.
 *
 * Catalogs are small (tens to a few hundred entries), so search is a
 * brute-force cosine scan over pre-computed embeddings.
 */

export interface VectorEntry {
  id: string;
  embedding: readonly number[];
}

export interface VectorHit {
  id: string;
  score: number;
}

export class VectorStore {
  private entries: VectorEntry[] = [];

  addEntries(entries: readonly VectorEntry[]): void {
    this.entries.push(...entries);
  }

  clear(): void {
    this.entries = [];
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Entries at or above `minScore`, best first. Equal scores keep
   * insertion order.
   */
  search(queryEmbedding: readonly number[], topK: number = 5, minScore: number = 0.82): VectorHit[] {
    if (this.entries.length === 0) return [];

    return this.entries
      .map((entry) => ({ id: entry.id, score: cosineSimilarity(queryEmbedding, entry.embedding) }))
      .filter((s) => s.score >= minScore)
      .sort((a, b) => b.score - a.score)
      .slice(0, topK);
  }
}

/** 0 for mismatched dimensions or zero vectors */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  if (denominator === 0) return 0;

  return dotProduct / denominator;
}
