import { EmptyInputError } from "./errors";
import type { Embedder, SearchHit, TranscriptChunk } from "./types";

/**
 * Scale a vector to unit length in place. A zero vector is returned unchanged.
 */
export function normalizeL2(v: Float32Array): Float32Array {
  let sum = 0;
  for (let i = 0; i < v.length; i++) sum += v[i] * v[i];
  const norm = Math.sqrt(sum);
  if (norm === 0) return v;
  for (let i = 0; i < v.length; i++) v[i] /= norm;
  return v;
}

/** Inner product up to the shorter length. Equals cosine for unit vectors. */
export function dot(a: Float32Array, b: Float32Array): number {
  let s = 0;
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) s += a[i] * b[i];
  return s;
}

/**
 * In-memory flat index over the chunks of a single transcript. Built once,
 * then read-only; safe to share across concurrent queries. Search is an
 * exact linear scan, which is plenty for a few hundred chunks.
 */
export class VectorStore {
  private readonly docs: readonly TranscriptChunk[];
  private readonly embedder: Embedder;

  private constructor(docs: TranscriptChunk[], embedder: Embedder) {
    this.docs = docs;
    this.embedder = embedder;
  }

  /**
   * Embed every chunk in one batched call and index the normalized vectors in
   * chunk order.
   *
   * @throws {EmptyInputError} If `chunks` is empty.
   */
  public static async build(chunks: readonly string[], embedder: Embedder): Promise<VectorStore> {
    if (chunks.length === 0) {
      console.error("[RAG] No chunks provided for vector store creation");
      throw new EmptyInputError();
    }
    const vectors = await embedder.embed(chunks);
    if (vectors.length !== chunks.length) {
      throw new Error(
        `Embedder returned ${vectors.length} vectors for ${chunks.length} chunks`,
      );
    }
    const docs = chunks.map((text, index) => ({
      index,
      text,
      emb: normalizeL2(Float32Array.from(vectors[index])),
    }));
    return new VectorStore(docs, embedder);
  }

  /** Number of indexed vectors (always equal to the chunk count). */
  public get size(): number {
    return this.docs.length;
  }

  public get chunks(): string[] {
    return this.docs.map((d) => d.text);
  }

  /**
   * Rank stored chunks against `query` by cosine similarity.
   *
   * @returns At most `min(topK, size)` hits, highest score first; equal scores
   *          keep chunk order. Blank queries yield no hits.
   */
  public async search(query: string, topK: number): Promise<SearchHit[]> {
    if (!query || !query.trim()) {
      console.error("[RAG] Empty query provided for search");
      return [];
    }
    const k = Math.min(Math.floor(topK), this.docs.length);
    if (!(k > 0)) return [];

    const [raw] = await this.embedder.embed([query]);
    const q = normalizeL2(Float32Array.from(raw));
    const scored = this.docs.map((d) => ({ index: d.index, score: dot(q, d.emb) }));
    scored.sort((a, b) => b.score - a.score); // stable: ties stay in chunk order

    const hits: SearchHit[] = [];
    for (const { index, score } of scored.slice(0, k)) {
      // A stale index would point past the chunk list; skip rather than misreport.
      if (index < 0 || index >= this.docs.length) continue;
      hits.push({ chunk: this.docs[index].text, index, score });
    }
    return hits;
  }
}
