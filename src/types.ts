import type { VectorStore } from "./vector-store";

/**
 * A single chunk of a transcript together with its normalized embedding.
 * Chunks are created once per (re)build and never mutated afterwards.
 */
export interface TranscriptChunk {
  /** Position within the transcript (0-based, stable for the build). */
  readonly index: number;
  /** Chunk text content. */
  readonly text: string;
  /** Unit-length embedding vector (a zero vector stays zero). */
  readonly emb: Float32Array;
}

/** One ranked search result. */
export interface SearchHit {
  readonly chunk: string;
  readonly index: number;
  /** Inner product of the normalized query and chunk vectors. */
  readonly score: number;
}

/** A built store plus the chunk texts it was built from. */
export interface TranscriptIndex {
  readonly store: VectorStore;
  readonly chunks: readonly string[];
}

/**
 * Anything that turns text into fixed-length vectors. Implementations must be
 * deterministic for a fixed model and input.
 */
export interface Embedder {
  /** Vector length; only meaningful once the model is loaded. */
  readonly dimension: number;
  embed(texts: readonly string[]): Promise<Float32Array[]>;
}
