/**
 * Application entry point.
 *
 * 1. Load environment configuration and point the model cache at disk.
 * 2. Load the embedding model eagerly; it is the one expensive, blocking
 *    startup cost and every later request depends on it.
 * 3. Wire the services explicitly: RagPipeline (chunk / index / context),
 *    StoreCache (per-transcript index, LRU), TranscriptStore (files on disk)
 *    and ChatService (retrieval + Gemini answer).
 * 4. Serve either HTTP (JSON API + MCP at /mcp, default) or MCP over stdio
 *    (MCP_TRANSPORT=stdio).
 *
 * Transcripts are indexed lazily on their first query and kept in memory
 * until evicted; nothing about the index survives a restart.
 */
import { getConfig, type Config } from "./config";
import { Embeddings } from "./embeddings";
import { RagPipeline } from "./rag";
import { StoreCache } from "./store-cache";
import { TranscriptStore } from "./transcripts";
import { ChatService, GeminiAnswerModel, TranscriptStructurer } from "./answer";
import { StatusManager } from "./status";
import { createMcpServer } from "./mcp-server";
import { startHttpTransport } from "./transport/http";
import { startStdioTransport } from "./transport/stdio";

const config: Config = getConfig();

// Must run before any pipeline is created so downloads land in the configured directory.
await Embeddings.configureCache(config.TRANSFORMERS_CACHE);

const embeddings = new Embeddings(config.EMBEDDING_MODEL);
await embeddings.init();

const pipeline = new RagPipeline({
  embedder: embeddings,
  chunkSize: config.CHUNK_SIZE,
  chunkOverlap: config.CHUNK_OVERLAP,
  verbose: config.VERBOSE,
});
const cache = new StoreCache({
  pipeline,
  maxEntries: config.CACHE_MAX_ENTRIES,
  verbose: config.VERBOSE,
});
const transcripts = new TranscriptStore(config.TRANSCRIPTS_DIR);

if (!config.GEMINI_API_KEY) {
  console.error(
    "[Chat] GEMINI_API_KEY not set; /chat and structuring are disabled, context retrieval still works.",
  );
}
const gemini = config.GEMINI_API_KEY
  ? new GeminiAnswerModel({ apiKey: config.GEMINI_API_KEY, model: config.GEMINI_MODEL })
  : undefined;
const chat = new ChatService({
  transcripts,
  cache,
  pipeline,
  model: gemini,
  structurer: gemini ? new TranscriptStructurer({ model: gemini }) : undefined,
  topK: config.TOP_K,
  minSimilarity: config.MIN_SIMILARITY,
});

const status = new StatusManager(() => cache.size);
status.markModelReady(embeddings.getModelName(), embeddings.dimension);

const deps = { chat, transcripts, status };

if (config.MCP_TRANSPORT === "stdio") {
  status.markTransport("stdio");
  await startStdioTransport(() => createMcpServer(deps));
} else {
  status.markTransport("http");
  await startHttpTransport({
    ...deps,
    createMcpServer: () => createMcpServer(deps),
    maxTranscriptChars: config.MAX_TRANSCRIPT_CHARS,
    port: config.PORT,
    host: config.HOST,
  });
}
