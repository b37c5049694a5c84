import { KnowledgeEntryConfig, TenantThresholds } from '../config/types';
import { ConfigurationError } from '../errors';
import { normalize } from '../text/normalize';
import { TemplateValues, renderTemplate } from '../text/template';
import { VectorStore } from './vector-store';

export interface KnowledgeEntry {
  id: string;
  question: string;
  /** Rendered against the tenant profile at build time */
  answer: string;
  keywords: readonly string[];
  embedding?: readonly number[];
}

export type SearchStrategy = 'semantic' | 'keyword';

export interface CatalogHit {
  entry: KnowledgeEntry;
  score: number;
  strategy: SearchStrategy;
}

export type CatalogOptions = Pick<TenantThresholds, 'semanticThreshold' | 'minKeywordOverlap'>;

const DEFAULT_LIMIT = 3;

/**
 * A tenant's question/answer catalog with two lookup strategies behind
 * one interface: cosine similarity when embeddings are available, keyword
 * overlap otherwise.
 */
export class KnowledgeCatalog {
  private readonly entries: readonly KnowledgeEntry[];
  private readonly normalizedKeywords: ReadonlyArray<readonly string[]>;
  private readonly vectors = new VectorStore();
  private readonly byId: ReadonlyMap<string, KnowledgeEntry>;

  private constructor(entries: KnowledgeEntry[], private readonly options: CatalogOptions) {
    this.entries = Object.freeze(entries);
    this.normalizedKeywords = entries.map((e) =>
      Object.freeze(e.keywords.map((k) => normalize(k)).filter((k) => k.length > 0)),
    );
    this.byId = new Map(entries.map((e) => [e.id, e]));
    this.vectors.addEntries(
      entries.flatMap((e) => (e.embedding ? [{ id: e.id, embedding: e.embedding }] : [])),
    );
  }

  static build(configs: readonly KnowledgeEntryConfig[], values: TemplateValues, options: CatalogOptions): KnowledgeCatalog {
    const seen = new Set<string>();
    const entries = configs.map((cfg) => {
      if (seen.has(cfg.id)) throw new ConfigurationError(`Duplicate knowledge entry id: ${cfg.id}`, { id: cfg.id });
      seen.add(cfg.id);
      return Object.freeze({
        id: cfg.id,
        question: cfg.question,
        answer: renderTemplate(cfg.answer, values, `knowledge ${cfg.id}`),
        keywords: Object.freeze([...cfg.keywords]),
        embedding: cfg.embedding ? Object.freeze([...cfg.embedding]) : undefined,
      });
    });
    return new KnowledgeCatalog(entries, options);
  }

  static empty(options: CatalogOptions): KnowledgeCatalog {
    return new KnowledgeCatalog([], options);
  }

  get size(): number {
    return this.entries.length;
  }

  get hasEmbeddings(): boolean {
    return this.vectors.size > 0;
  }

  /** Text to embed for each entry, in catalog order */
  embeddingInputs(): string[] {
    return this.entries.map((e) => `${e.question} ${e.answer} ${e.keywords.join(' ')}`);
  }

  /** New catalog with one embedding per entry (same order as `embeddingInputs`) */
  withEmbeddings(embeddings: readonly (readonly number[])[]): KnowledgeCatalog {
    if (embeddings.length !== this.entries.length) {
      throw new ConfigurationError(`Expected ${this.entries.length} embeddings, got ${embeddings.length}`);
    }
    const entries = this.entries.map((e, i) => Object.freeze({ ...e, embedding: Object.freeze([...embeddings[i]]) }));
    return new KnowledgeCatalog(entries, this.options);
  }

  /** Ranked hits, best first */
  search(text: string, queryEmbedding?: readonly number[], limit: number = DEFAULT_LIMIT): CatalogHit[] {
    if (this.entries.length === 0) return [];

    if (queryEmbedding && this.hasEmbeddings) {
      const semantic = this.vectors
        .search(queryEmbedding, limit, this.options.semanticThreshold)
        .flatMap((hit) => {
          const entry = this.byId.get(hit.id);
          return entry ? [{ entry, score: hit.score, strategy: 'semantic' as const }] : [];
        });
      if (semantic.length > 0) return semantic;
    }

    return this.keywordSearch(text, limit);
  }

  lookup(text: string, queryEmbedding?: readonly number[]): CatalogHit | null {
    return this.search(text, queryEmbedding, 1)[0] ?? null;
  }

  /**
   * Score = share of an entry's keywords that occur in the message.
   * Array.prototype.sort is stable, so ties keep catalog order.
   */
  private keywordSearch(text: string, limit: number): CatalogHit[] {
    const normalized = normalize(text);
    if (!normalized) return [];

    const hits: CatalogHit[] = [];
    this.entries.forEach((entry, i) => {
      const keywords = this.normalizedKeywords[i];
      if (keywords.length === 0) return;
      const found = keywords.filter((k) => normalized.includes(k)).length;
      const score = found / keywords.length;
      if (found > 0 && score >= this.options.minKeywordOverlap) {
        hits.push({ entry, score, strategy: 'keyword' });
      }
    });

    return hits.sort((a, b) => b.score - a.score).slice(0, limit);
  }
}
