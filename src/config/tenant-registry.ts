import * as fs from 'fs';
import { TenantNotFoundError } from '../errors';
import { EmbeddingProvider } from '../knowledge/embedding-service';
import { logger } from '../observability/logger';
import {
  BuildOptions,
  TENANT_ID_RE,
  TenantContext,
  loadTenantDirectory,
  loadTenantFile,
  tenantFilePath,
} from './tenant-loader';

/** What the router needs from a registry */
export interface TenantSource {
  getOrCreate(tenantId: string): TenantContext;
}

export interface TenantRegistryOptions extends BuildOptions {
  configDir: string;
}

/**
 * Owns the compiled tenant contexts. Contexts are immutable; every change
 * (reload, embeddings) builds a new one and swaps the map entry, so a
 * request that already holds a context never sees it change.
 */
export class TenantRegistry implements TenantSource {
  private readonly contexts = new Map<string, TenantContext>();
  private readonly log = logger.child({ component: 'tenant-registry' });

  constructor(private readonly options: TenantRegistryOptions) {}

  /** Load every valid tenant file up front */
  preload(): string[] {
    for (const [tenantId, context] of loadTenantDirectory(this.options.configDir, this.options)) {
      this.contexts.set(tenantId, context);
    }
    return this.list();
  }

  /** Cached context, loading the tenant file on first use */
  getOrCreate(tenantId: string): TenantContext {
    const cached = this.contexts.get(tenantId);
    if (cached) return cached;

    const context = loadTenantFile(this.existingFile(tenantId), this.options);
    this.contexts.set(tenantId, context);
    this.log.info({ tenantId }, 'Tenant loaded');
    return context;
  }

  /** Drop the cached context; the next request loads it again */
  invalidate(tenantId: string): boolean {
    return this.contexts.delete(tenantId);
  }

  /**
   * Re-read a tenant file and swap it in. If the new file is invalid the
   * error propagates and the previous context stays in service.
   */
  reload(tenantId: string): TenantContext {
    const context = loadTenantFile(this.existingFile(tenantId), this.options);
    this.contexts.set(tenantId, context);
    this.log.info({ tenantId }, 'Tenant reloaded');
    return context;
  }

  replace(context: TenantContext): void {
    this.contexts.set(context.tenantId, context);
  }

  /** Compute catalog embeddings once and swap in the embedded catalog */
  async warmEmbeddings(tenantId: string, embedder: EmbeddingProvider): Promise<boolean> {
    const context = this.getOrCreate(tenantId);
    if (context.catalog.size === 0 || context.catalog.hasEmbeddings) return false;

    const vectors = await embedder.embedBatch(context.catalog.embeddingInputs());
    // Only swap if nobody reloaded the tenant meanwhile
    if (this.contexts.get(tenantId) !== context) return false;

    this.replace(Object.freeze({ ...context, catalog: context.catalog.withEmbeddings(vectors) }));
    this.log.info({ tenantId, entries: vectors.length }, 'Catalog embeddings ready');
    return true;
  }

  has(tenantId: string): boolean {
    return this.contexts.has(tenantId);
  }

  list(): string[] {
    return [...this.contexts.keys()].sort();
  }

  private existingFile(tenantId: string): string {
    if (!TENANT_ID_RE.test(tenantId)) throw new TenantNotFoundError(tenantId);
    const filepath = tenantFilePath(this.options.configDir, tenantId);
    if (!fs.existsSync(filepath)) throw new TenantNotFoundError(tenantId);
    return filepath;
  }
}
