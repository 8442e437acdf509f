import fs from "node:fs/promises";
import path from "node:path";
import { env, pipeline, type FeatureExtractionPipeline } from "@huggingface/transformers";
import { DEFAULT_EMBEDDING_MODEL } from "./config";
import { EmbedderNotInitializedError } from "./errors";
import type { Embedder } from "./types";

/**
 * Encapsulates embedding model initialization. Construct one instance at
 * startup, await {@link init} once, then hand it to whatever needs vectors.
 */
export class Embeddings implements Embedder {
  private readonly modelName: string;
  private embedder: FeatureExtractionPipeline | null = null;
  private dim = 0;

  public constructor(modelName?: string) {
    // Resolution precedence: explicit ctor arg > EMBEDDING_MODEL env var > default model
    this.modelName =
      modelName?.trim() || process.env.EMBEDDING_MODEL?.trim() || DEFAULT_EMBEDDING_MODEL;
  }

  /**
   * Point the transformers file cache at `cacheDir`, creating it if needed.
   * Call before the first {@link init} so downloads land there.
   *
   * @param cacheDir Explicit directory; falls back to TRANSFORMERS_CACHE, then
   *                 `.cache/transformers` under the working directory.
   * @returns Resolved cache directory.
   */
  public static async configureCache(cacheDir?: string): Promise<string> {
    const dir = path.resolve(
      cacheDir?.trim() || process.env.TRANSFORMERS_CACHE?.trim() || ".cache/transformers",
    );
    await fs.mkdir(dir, { recursive: true });
    env.useBrowserCache = false;
    env.cacheDir = dir;
    env.allowLocalModels = true;
    console.error(`[RAG] Using model cache at: ${dir}`);
    return dir;
  }

  /** @returns Resolved (possibly defaulted) underlying model identifier. */
  public getModelName(): string {
    return this.modelName;
  }

  /** Output vector length. Zero until {@link init} has completed. */
  public get dimension(): number {
    return this.dim;
  }

  public isReady(): boolean {
    return this.embedder !== null;
  }

  /** Load the feature-extraction pipeline (idempotent). Blocks on first download. */
  public async init(): Promise<void> {
    if (this.embedder) return; // already initialized
    console.error(`[RAG] Loading embedding model: ${this.modelName}`);
    this.embedder = await pipeline("feature-extraction", this.modelName);
    const [sample] = await this.embed(["dimension check"]);
    this.dim = sample.length;
    console.error(`[RAG] Model ready: ${this.modelName} (dimension ${this.dim})`);
  }

  /**
   * Embed a batch of texts in one pipeline call using mean pooling.
   *
   * @returns One vector per input, in input order.
   * @throws {EmbedderNotInitializedError} If {@link init} has not been called.
   */
  public async embed(texts: readonly string[]): Promise<Float32Array[]> {
    if (!this.embedder) throw new EmbedderNotInitializedError();
    if (texts.length === 0) return [];
    const output = await this.embedder([...texts], { pooling: "mean", normalize: true });
    const data = output.data;
    if (!(data instanceof Float32Array)) {
      throw new TypeError(`Embedding model ${this.modelName} did not return float32 output`);
    }
    const width = output.dims[output.dims.length - 1];
    const vectors: Float32Array[] = [];
    for (let i = 0; i < texts.length; i++) {
      vectors.push(data.slice(i * width, (i + 1) * width));
    }
    return vectors;
  }
}
