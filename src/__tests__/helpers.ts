import type { Embedder } from "../types";

/**
 * Deterministic stand-in for the transformer model: each dimension counts
 * occurrences of one vocabulary word (case-insensitive). Words outside the
 * vocabulary are ignored, so unrelated text embeds to the zero vector.
 */
export class VocabularyEmbedder implements Embedder {
  public readonly calls: string[][] = [];
  private readonly vocab: Map<string, number>;

  public constructor(words: readonly string[]) {
    this.vocab = new Map(words.map((w, i) => [w.toLowerCase(), i]));
  }

  public get dimension(): number {
    return this.vocab.size;
  }

  public async embed(texts: readonly string[]): Promise<Float32Array[]> {
    this.calls.push([...texts]);
    return texts.map((t) => {
      const v = new Float32Array(this.vocab.size);
      for (const word of t.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
        const i = this.vocab.get(word);
        if (i !== undefined) v[i] += 1;
      }
      return v;
    });
  }
}

/** Embedder returning fixed vectors per exact text, for precise score checks. */
export class TableEmbedder implements Embedder {
  public readonly dimension: number;
  private readonly table: Map<string, number[]>;

  public constructor(table: Record<string, number[]>) {
    this.table = new Map(Object.entries(table));
    this.dimension = this.table.values().next().value?.length ?? 0;
  }

  public async embed(texts: readonly string[]): Promise<Float32Array[]> {
    return texts.map((t) => {
      const v = this.table.get(t);
      if (!v) throw new Error(`No vector for "${t}"`);
      return Float32Array.from(v);
    });
  }
}
