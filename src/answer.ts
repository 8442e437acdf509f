import { GoogleGenAI } from "@google/genai";
import { ExternalServiceError, getErrorMessage } from "./errors";
import { FALLBACK_RESPONSE, RAG_PROMPT, STRUCTURING_PROMPT, formatPrompt } from "./prompts";
import type { RagPipeline } from "./rag";
import type { StoreCache } from "./store-cache";
import type { TranscriptStore } from "./transcripts";
import type { SearchHit, TranscriptIndex } from "./types";

/** Sampling settings; unset fields keep the model's answering defaults. */
export interface GenerationOptions {
  temperature?: number;
  topP?: number;
  topK?: number;
  maxOutputTokens?: number;
}

export const ANSWER_GENERATION: Required<GenerationOptions> = {
  temperature: 0.4,
  topP: 0.8,
  topK: 40,
  maxOutputTokens: 1024,
};

// Lower temperature and a longer budget: the output is a whole rewritten transcript.
export const STRUCTURING_GENERATION: Required<GenerationOptions> = {
  temperature: 0.3,
  topP: 0.8,
  topK: 40,
  maxOutputTokens: 4096,
};

/** A generative model that completes a single prompt. */
export interface AnswerModel {
  readonly name: string;
  generate(prompt: string, options?: GenerationOptions): Promise<string>;
}

export interface GeminiAnswerModelOptions {
  apiKey: string;
  model?: string;
}

export class GeminiAnswerModel implements AnswerModel {
  public readonly name: string;
  private readonly client: GoogleGenAI;

  public constructor(opts: GeminiAnswerModelOptions) {
    this.client = new GoogleGenAI({ apiKey: opts.apiKey });
    this.name = opts.model ?? "gemini-flash-latest";
  }

  public async generate(prompt: string, options: GenerationOptions = {}): Promise<string> {
    try {
      const response = await this.client.models.generateContent({
        model: this.name,
        contents: prompt,
        config: { ...ANSWER_GENERATION, ...options },
      });
      return response.text ?? "";
    } catch (e) {
      throw new ExternalServiceError("Gemini", getErrorMessage(e));
    }
  }
}

export interface TranscriptStructurerOptions {
  model: AnswerModel;
  maxAttempts?: number;
}

/**
 * Turns a raw speech-to-text dump into a readable, speaker-attributed meeting
 * record with the model. Each attempt re-sends the full prompt; an empty
 * reply counts as a failed attempt.
 */
export class TranscriptStructurer {
  private readonly model: AnswerModel;
  private readonly maxAttempts: number;

  public constructor(opts: TranscriptStructurerOptions) {
    this.model = opts.model;
    this.maxAttempts = Math.max(1, opts.maxAttempts ?? 3);
  }

  /** @throws {ExternalServiceError} Once every attempt has failed. */
  public async structure(raw: string): Promise<string> {
    console.error(`[Structure] Structuring transcript (${raw.length} chars) with ${this.model.name}`);
    const prompt = formatPrompt(STRUCTURING_PROMPT, { transcript: raw });
    let lastError = "";
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        const text = (await this.model.generate(prompt, STRUCTURING_GENERATION)).trim();
        if (!text) throw new Error("model returned an empty response");
        console.error(`[Structure] Transcript structured (${text.length} chars)`);
        return text;
      } catch (e) {
        lastError = getErrorMessage(e);
        console.error(`[Structure] Attempt ${attempt} failed: ${lastError}`);
      }
    }
    throw new ExternalServiceError(
      "Transcript structuring",
      `failed after ${this.maxAttempts} attempts: ${lastError}`,
    );
  }
}

export interface ChatServiceOptions {
  transcripts: TranscriptStore;
  cache: StoreCache;
  pipeline: Pick<RagPipeline, "getContextForQuery" | "search">;
  /** Absent when no API key is configured; {@link ChatService.ask} then fails. */
  model?: AnswerModel;
  /** Absent when no API key is configured; structured submissions then fail. */
  structurer?: TranscriptStructurer;
  topK: number;
  minSimilarity: number;
}

export interface ChatAnswer {
  answer: string;
  /** False when the canned fallback was returned instead of a model answer. */
  grounded: boolean;
}

/**
 * Glue between the retrieval core and the answer model: resolve the
 * transcript index through the cache, assemble context, and only call the
 * model when there is something relevant to ground the answer on.
 */
export class ChatService {
  private readonly opts: ChatServiceOptions;

  public constructor(opts: ChatServiceOptions) {
    this.opts = opts;
  }

  /**
   * Store a transcript, optionally structuring it first; re-submitting an id
   * drops its stale index.
   */
  public async submit(text: string, transcriptId?: string, structure = false): Promise<string> {
    let stored = text;
    if (structure) {
      // Reject a bad id before paying for a model call.
      if (transcriptId !== undefined) this.opts.transcripts.pathFor(transcriptId);
      const { structurer } = this.opts;
      if (!structurer) {
        throw new ExternalServiceError("Transcript structuring", "GEMINI_API_KEY is not configured");
      }
      stored = await structurer.structure(text);
    }
    const id = await this.opts.transcripts.save(stored, transcriptId);
    this.opts.cache.delete(id);
    return id;
  }

  /**
   * Cached index for a transcript; the file is only read on a cache miss.
   * @throws {NotFoundError} For an unknown transcript id.
   */
  public index(transcriptId: string): Promise<TranscriptIndex> {
    const { transcripts, cache } = this.opts;
    return cache.getOrBuild(transcriptId, () => transcripts.load(transcriptId));
  }

  public async context(
    transcriptId: string,
    query: string,
    topK = this.opts.topK,
    minSimilarity = this.opts.minSimilarity,
  ): Promise<string> {
    const index = await this.index(transcriptId);
    return this.opts.pipeline.getContextForQuery(index, query, topK, minSimilarity);
  }

  public async search(transcriptId: string, query: string, topK = this.opts.topK): Promise<SearchHit[]> {
    const index = await this.index(transcriptId);
    return this.opts.pipeline.search(index, query, topK);
  }

  public async ask(transcriptId: string, query: string): Promise<ChatAnswer> {
    console.error(`[Chat] Chat request for transcript ${transcriptId}: ${query.slice(0, 50)}...`);
    const context = await this.context(transcriptId, query);
    if (!context) {
      console.error("[Chat] No relevant context found for query");
      return { answer: FALLBACK_RESPONSE, grounded: false };
    }
    const { model } = this.opts;
    if (!model) throw new ExternalServiceError("Answer model", "GEMINI_API_KEY is not configured");

    const answer = (await model.generate(formatPrompt(RAG_PROMPT, { context, query }))).trim();
    if (!answer) return { answer: FALLBACK_RESPONSE, grounded: false };
    console.error(`[Chat] Answer generated successfully (${answer.length} characters)`);
    return { answer, grounded: true };
  }
}
