import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { Server as HttpServer } from "node:http";
import { createHttpApp } from "../transport/http";
import { createMcpServer } from "../mcp-server";
import { ChatService, TranscriptStructurer, type AnswerModel } from "../answer";
import { RagPipeline } from "../rag";
import { StoreCache } from "../store-cache";
import { StatusManager } from "../status";
import { TranscriptStore } from "../transcripts";
import { FALLBACK_RESPONSE } from "../prompts";
import { VocabularyEmbedder } from "./helpers";

const TRANSCRIPT = [
  "Speaker 1: The budget review is due Friday.",
  "Speaker 2: Marketing launch moves to March.",
].join("\n\n");

const BUDGET_SECTION =
  "[Relevant Section 1] (Relevance: 0.82)\nSpeaker 1: The budget review is due Friday.";

interface Reply {
  status: number;
  body: unknown;
}

describe("HTTP API", () => {
  let dir: string;
  let server: HttpServer;
  let baseUrl: string;
  let transcripts: TranscriptStore;
  let status: StatusManager;
  let chat: ChatService;

  async function start(options: { model?: AnswerModel; structurer?: TranscriptStructurer } = {}) {
    const pipeline = new RagPipeline({
      embedder: new VocabularyEmbedder(["budget", "review", "friday", "marketing", "launch", "march"]),
      chunkSize: 50,
      chunkOverlap: 0,
    });
    const cache = new StoreCache({ pipeline });
    chat = new ChatService({ transcripts, cache, pipeline, ...options, topK: 3, minSimilarity: 0.3 });
    status = new StatusManager(() => cache.size);
    status.markModelReady("vocab", 6);
    const deps = { chat, transcripts, status };
    const app = createHttpApp({
      ...deps,
      createMcpServer: () => createMcpServer(deps),
      maxTranscriptChars: 1000,
      port: 0,
      host: "127.0.0.1",
    });

    server = await new Promise<HttpServer>((resolve, reject) => {
      const listener = app.listen(0, "127.0.0.1", () => resolve(listener));
      listener.on("error", reject);
    });
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("expected a TCP address");
    baseUrl = `http://127.0.0.1:${address.port}`;
  }

  async function request(method: string, route: string, body?: unknown): Promise<Reply> {
    const res = await fetch(`${baseUrl}${route}`, {
      method,
      headers: body === undefined ? undefined : { "content-type": "application/json" },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    return { status: res.status, body: await res.json() };
  }

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "http-"));
    transcripts = new TranscriptStore(dir);
    await transcripts.save(TRANSCRIPT, "m1");
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((e) => (e ? reject(e) : resolve())));
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe("without an answer model", () => {
    beforeEach(async () => {
      await start();
    });

    it("reports health with the model and cache state", async () => {
      const reply = await request("GET", "/health");
      expect(reply.status).toBe(200);
      expect(reply.body).toMatchObject({
        status: "healthy",
        modelName: "vocab",
        embeddingDimension: 6,
        ready: true,
        cachedTranscripts: 0,
      });
    });

    it("stores a submitted transcript and returns 201 with its id", async () => {
      const created = await request("POST", "/transcripts", {
        transcript: "  Speaker 1: Hiring plan approved.  ",
        transcript_id: "hiring",
      });
      expect(created).toEqual({ status: 201, body: { success: true, transcript_id: "hiring" } });

      expect(await request("GET", "/transcripts/hiring")).toEqual({
        status: 200,
        body: { success: true, transcript_id: "hiring", transcript: "Speaker 1: Hiring plan approved." },
      });
      expect(await request("GET", "/transcripts")).toEqual({
        status: 200,
        body: { success: true, transcripts: ["hiring", "m1"] },
      });
    });

    it("rejects a blank transcript", async () => {
      const reply = await request("POST", "/transcripts", { transcript: "   " });
      expect(reply).toEqual({
        status: 400,
        body: { success: false, error: expect.stringContaining("Missing transcript") },
      });
    });

    it("rejects a transcript over the size limit", async () => {
      const reply = await request("POST", "/transcripts", { transcript: "x".repeat(1001) });
      expect(reply.status).toBe(400);
      expect(reply.body).toMatchObject({ success: false });
    });

    it("returns 404 for an unknown transcript", async () => {
      expect(await request("GET", "/transcripts/nope")).toEqual({
        status: 404,
        body: { success: false, error: "Transcript not found" },
      });
      expect(await request("POST", "/context", { transcript_id: "nope", query: "budget" })).toEqual({
        status: 404,
        body: { success: false, error: "Transcript not found" },
      });
    });

    it("returns 400 for an id outside the allowed alphabet", async () => {
      expect(await request("GET", "/transcripts/bad.id")).toEqual({
        status: 400,
        body: { success: false, error: "Invalid transcript id: bad.id" },
      });
    });

    it("returns context with the configured defaults", async () => {
      const reply = await request("POST", "/context", {
        transcript_id: "m1",
        query: "When is the budget review?",
      });
      expect(reply).toEqual({
        status: 200,
        body: { success: true, transcript_id: "m1", context: BUDGET_SECTION },
      });
      expect(status.getStatus().counters.queries).toBe(1);
    });

    it("passes top_k and min_similarity through to retrieval", async () => {
      const context = vi.spyOn(chat, "context");
      const reply = await request("POST", "/context", {
        transcript_id: "m1",
        query: "When is the budget review?",
        top_k: 2,
        min_similarity: 0,
      });

      expect(context).toHaveBeenCalledWith("m1", "When is the budget review?", 2, 0);
      expect(reply.body).toEqual({
        success: true,
        transcript_id: "m1",
        context: `${BUDGET_SECTION}\n\n---\n\n[Relevant Section 2] (Relevance: 0.00)\nSpeaker 2: Marketing launch moves to March.`,
      });
    });

    it("validates the query and top_k", async () => {
      expect(await request("POST", "/context", { transcript_id: "m1" })).toEqual({
        status: 400,
        body: { success: false, error: expect.stringContaining('"query"') },
      });
      expect(
        await request("POST", "/context", { transcript_id: "m1", query: "budget", top_k: 0 }),
      ).toEqual({
        status: 400,
        body: { success: false, error: expect.stringContaining('"top_k"') },
      });
      expect(
        await request("POST", "/context", { transcript_id: "m1", query: "budget", top_k: "3" }),
      ).toEqual({
        status: 400,
        body: { success: false, error: expect.stringContaining('"top_k"') },
      });
      expect(status.getStatus().counters.queries).toBe(0);
    });

    it("fails /chat with 502 when no model is configured", async () => {
      expect(
        await request("POST", "/chat", { transcript_id: "m1", query: "When is the budget review?" }),
      ).toEqual({
        status: 502,
        body: { success: false, error: "Answer model error: GEMINI_API_KEY is not configured" },
      });
    });

    it("answers /chat with the fallback when nothing is relevant", async () => {
      expect(await request("POST", "/chat", { transcript_id: "m1", query: "Who brought snacks?" })).toEqual({
        status: 200,
        body: { success: true, answer: FALLBACK_RESPONSE, transcript_id: "m1" },
      });
      expect(status.getStatus().counters).toEqual({ queries: 1, answers: 0, fallbacks: 1 });
    });

    it("fails a structured submission with 502 and stores nothing", async () => {
      const reply = await request("POST", "/transcripts", {
        transcript: "um the budget",
        transcript_id: "raw",
        structure: true,
      });
      expect(reply).toEqual({
        status: 502,
        body: { success: false, error: "Transcript structuring error: GEMINI_API_KEY is not configured" },
      });
      expect(await transcripts.list()).toEqual(["m1"]);
    });
  });

  describe("with a model", () => {
    it("answers /chat from the model and counts the answer", async () => {
      const generate = vi.fn(async (_prompt: string) => " Friday. ");
      await start({ model: { name: "stub", generate } });

      expect(
        await request("POST", "/chat", { transcript_id: "m1", query: "When is the budget review?" }),
      ).toEqual({ status: 200, body: { success: true, answer: "Friday.", transcript_id: "m1" } });
      expect(status.getStatus().counters).toEqual({ queries: 1, answers: 1, fallbacks: 0 });
    });

    it("structures raw text before saving when asked", async () => {
      const generate = vi.fn(async (_prompt: string) => "## Key Topics Discussed\n\nBudget.");
      await start({ structurer: new TranscriptStructurer({ model: { name: "stub", generate } }) });

      const reply = await request("POST", "/transcripts", {
        transcript: "um so the budget",
        transcript_id: "structured",
        structure: true,
      });

      expect(reply).toEqual({ status: 201, body: { success: true, transcript_id: "structured" } });
      expect(await transcripts.load("structured")).toBe("## Key Topics Discussed\n\nBudget.");
      expect(generate).toHaveBeenCalledTimes(1);
    });

    it("rejects a non-boolean structure flag", async () => {
      const generate = vi.fn(async (_prompt: string) => "unused");
      await start({ structurer: new TranscriptStructurer({ model: { name: "stub", generate } }) });

      const reply = await request("POST", "/transcripts", { transcript: "text", structure: "yes" });
      expect(reply).toEqual({
        status: 400,
        body: { success: false, error: expect.stringContaining('"structure"') },
      });
      expect(generate).not.toHaveBeenCalled();
    });
  });
});
