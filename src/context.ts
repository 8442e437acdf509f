import type { VectorStore } from "./vector-store";
import type { SearchHit } from "./types";

export const DEFAULT_TOP_K = 3;
export const DEFAULT_MIN_SIMILARITY = 0.3;
export const SECTION_SEPARATOR = "\n\n---\n\n";

export interface ContextOptions {
  /** How many candidates to retrieve before filtering. */
  topK?: number;
  /** Candidates scoring below this are dropped (comparison is `>=`). */
  minSimilarity?: number;
}

/** Render ranked hits as labelled sections joined by {@link SECTION_SEPARATOR}. */
export function formatContext(hits: readonly SearchHit[]): string {
  return hits
    .map((h, i) => `[Relevant Section ${i + 1}] (Relevance: ${h.score.toFixed(2)})\n${h.chunk}`)
    .join(SECTION_SEPARATOR);
}

/**
 * Retrieve the top candidates for `query` and keep only those that clear the
 * relevance threshold.
 *
 * @returns Formatted context block, or `""` when nothing is relevant enough.
 */
export async function getContext(
  store: VectorStore,
  query: string,
  opts: ContextOptions = {},
): Promise<string> {
  const { topK = DEFAULT_TOP_K, minSimilarity = DEFAULT_MIN_SIMILARITY } = opts;
  const hits = await store.search(query, topK);
  const relevant = hits.filter((h) => h.score >= minSimilarity);
  if (relevant.length === 0) {
    console.error(`[RAG] No results above similarity threshold ${minSimilarity}`);
    return "";
  }
  const context = formatContext(relevant);
  console.error(
    `[RAG] Generated context of length ${context.length} from ${relevant.length} chunks`,
  );
  return context;
}
