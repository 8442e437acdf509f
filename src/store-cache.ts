import type { RagPipeline } from "./rag";
import type { TranscriptIndex } from "./types";

/** Transcript text, or a loader that is only invoked on a cache miss. */
export type TextSource = string | (() => Promise<string>);

export interface StoreCacheOptions {
  pipeline: Pick<RagPipeline, "indexText">;
  /** LRU bound on cached transcripts; 0 disables eviction. */
  maxEntries?: number;
  verbose?: boolean;
}

/**
 * Process-wide map from transcript id to its built index.
 *
 * The pending build promise is stored before it settles, so concurrent
 * requests for the same id share a single chunk + embed pass. Failed builds
 * are forgotten and the error is rethrown to every waiter. Map insertion
 * order doubles as recency order for LRU eviction.
 */
export class StoreCache {
  private readonly entries = new Map<string, Promise<TranscriptIndex>>();
  private readonly pipeline: Pick<RagPipeline, "indexText">;
  private readonly maxEntries: number;
  private readonly verbose: boolean;

  public constructor(opts: StoreCacheOptions) {
    this.pipeline = opts.pipeline;
    this.maxEntries = Math.max(0, Math.floor(opts.maxEntries ?? 0));
    this.verbose = !!opts.verbose;
  }

  public get size(): number {
    return this.entries.size;
  }

  public has(docId: string): boolean {
    return this.entries.has(docId);
  }

  public delete(docId: string): boolean {
    return this.entries.delete(docId);
  }

  public clear(): void {
    this.entries.clear();
  }

  /** Return the cached index for `docId`, building it from `source` on a miss. */
  public getOrBuild(docId: string, source: TextSource): Promise<TranscriptIndex> {
    const cached = this.entries.get(docId);
    if (cached) {
      // refresh recency
      this.entries.delete(docId);
      this.entries.set(docId, cached);
      if (this.verbose) console.error(`[RAG][verbose] Using cached vector store for ${docId}`);
      return cached;
    }

    console.error(`[RAG] Creating vector store for transcript ${docId}`);
    const pending = this.build(source);
    this.entries.set(docId, pending);
    pending.catch(() => {
      if (this.entries.get(docId) === pending) this.entries.delete(docId);
    });
    this.evict();
    return pending;
  }

  private async build(source: TextSource): Promise<TranscriptIndex> {
    const text = typeof source === "string" ? source : await source();
    return this.pipeline.indexText(text);
  }

  private evict(): void {
    if (this.maxEntries === 0) return;
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) return;
      this.entries.delete(oldest.value);
      if (this.verbose) console.error(`[RAG][verbose] Evicted vector store for ${oldest.value}`);
    }
  }
}
