import { chunkText, DEFAULT_CHUNK_OVERLAP, DEFAULT_CHUNK_SIZE } from "./chunker";
import { DEFAULT_MIN_SIMILARITY, DEFAULT_TOP_K, getContext } from "./context";
import { VectorStore } from "./vector-store";
import type { Embedder, SearchHit, TranscriptIndex } from "./types";

export interface RagPipelineOptions {
  embedder: Embedder; // initialized embedder instance
  chunkSize?: number; // optional override (default 500)
  chunkOverlap?: number; // optional override (default 50)
  verbose?: boolean; // extra logging
}

/**
 * The retrieval surface handed to the HTTP and MCP layers: chunk a transcript,
 * index it, and turn a question into a context block for the answer model.
 * Holds no per-transcript state; caching lives in {@link StoreCache}.
 */
export class RagPipeline {
  private readonly embedder: Embedder;
  private readonly chunkSize: number;
  private readonly chunkOverlap: number;
  private readonly verbose: boolean;

  public constructor(opts: RagPipelineOptions) {
    this.embedder = opts.embedder;
    this.chunkSize = opts.chunkSize ?? DEFAULT_CHUNK_SIZE;
    this.chunkOverlap = opts.chunkOverlap ?? DEFAULT_CHUNK_OVERLAP;
    this.verbose = !!opts.verbose;
  }

  public chunkText(text: string): string[] {
    const chunks = chunkText(text, this.chunkSize, this.chunkOverlap);
    if (chunks.length === 0) console.error("[RAG] Empty text provided for chunking");
    else console.error(`[RAG] Created ${chunks.length} chunks from text of length ${text.length}`);
    return chunks;
  }

  /** @throws {EmptyInputError} If `chunks` is empty. */
  public async createVectorStore(chunks: readonly string[]): Promise<TranscriptIndex> {
    console.error(`[RAG] Creating embeddings for ${chunks.length} chunks...`);
    const store = await VectorStore.build(chunks, this.embedder);
    console.error(`[RAG] Vector store created with ${store.size} vectors`);
    return { store, chunks: [...chunks] };
  }

  /** Chunk and index a full transcript in one step. */
  public async indexText(text: string): Promise<TranscriptIndex> {
    return this.createVectorStore(this.chunkText(text));
  }

  public async search(index: TranscriptIndex, query: string, topK = DEFAULT_TOP_K): Promise<SearchHit[]> {
    if (this.verbose) console.error(`[RAG][verbose] Searching for: '${query.slice(0, 50)}...'`);
    const hits = await index.store.search(query, topK);
    if (this.verbose) {
      for (const h of hits) {
        console.error(`[RAG][verbose] Found chunk ${h.index} with similarity ${h.score.toFixed(4)}`);
      }
    }
    return hits;
  }

  public async getContextForQuery(
    index: TranscriptIndex,
    query: string,
    topK = DEFAULT_TOP_K,
    minSimilarity = DEFAULT_MIN_SIMILARITY,
  ): Promise<string> {
    return getContext(index.store, query, { topK, minSimilarity });
  }
}
