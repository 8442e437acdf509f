import { APP_VERSION } from "./config";

/** Monotonic counters for query traffic since startup. */
export interface QueryCounters {
  /** Context / search requests served. */
  queries: number;
  /** Chat requests answered by the model. */
  answers: number;
  /** Chat requests that fell back to the canned reply. */
  fallbacks: number;
}

/**
 * Snapshot served by /health. `ready` flips once the embedding model has
 * loaded; before that every retrieval call would fail.
 */
export interface ServerStatus {
  version: string;
  modelName: string;
  embeddingDimension: number;
  /** Active transport: 'stdio' | 'http' | 'unknown'. */
  transport: string;
  ready: boolean;
  startedAt: string;
  /** Transcripts currently held in the vector store cache. */
  cachedTranscripts: number;
  counters: QueryCounters;
}

/**
 * Mutable server status. One instance is created at startup and passed to
 * the transports; `cachedTranscripts` is read live from the supplied callback.
 */
export class StatusManager {
  private readonly data: Omit<ServerStatus, "cachedTranscripts">;
  private readonly cacheSize: () => number;

  public constructor(cacheSize: () => number = () => 0, initial?: Partial<ServerStatus>) {
    this.cacheSize = cacheSize;
    this.data = {
      version: initial?.version ?? APP_VERSION,
      modelName: initial?.modelName ?? "",
      embeddingDimension: initial?.embeddingDimension ?? 0,
      transport: initial?.transport ?? "unknown",
      ready: initial?.ready ?? false,
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      counters: initial?.counters ?? { queries: 0, answers: 0, fallbacks: 0 },
    };
  }

  public markTransport(t: string) {
    this.data.transport = t;
  }

  public markModelReady(name: string, dimension: number) {
    this.data.modelName = name;
    this.data.embeddingDimension = dimension;
    this.data.ready = true;
  }

  public countQuery() {
    this.data.counters.queries++;
  }

  public countAnswer(grounded: boolean) {
    if (grounded) this.data.counters.answers++;
    else this.data.counters.fallbacks++;
  }

  public getStatus(): ServerStatus {
    return { ...this.data, counters: { ...this.data.counters }, cachedTranscripts: this.cacheSize() };
  }
}
