import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
// Version comes straight from package.json (tsconfig "resolveJsonModule": true)
import pkg from "../package.json";

// Single dotenv.config() call: prefer the .env at the project root, else the default lookup.
(() => {
  const rootEnv = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../.env");
  if (fsSync.existsSync(rootEnv)) {
    dotenv.config({ path: rootEnv });
    return;
  }
  dotenv.config();
})();

/** Application version sourced from package.json. */
export const APP_VERSION: string = pkg.version;

export const DEFAULT_EMBEDDING_MODEL = "Xenova/all-MiniLM-L6-v2";

export type Transport = "http" | "stdio";

export interface Config {
  TRANSCRIPTS_DIR: string;
  EMBEDDING_MODEL: string;
  TRANSFORMERS_CACHE: string | undefined;
  CHUNK_SIZE: number;
  CHUNK_OVERLAP: number;
  TOP_K: number;
  MIN_SIMILARITY: number;
  CACHE_MAX_ENTRIES: number;
  MAX_TRANSCRIPT_CHARS: number;
  GEMINI_API_KEY: string | undefined;
  GEMINI_MODEL: string;
  MCP_TRANSPORT: Transport;
  PORT: number;
  HOST: string;
  VERBOSE: boolean;
}

function num(raw: string | undefined, fallback: number, accept: (n: number) => boolean): number {
  const s = raw?.trim();
  if (!s) return fallback;
  const n = Number(s);
  return Number.isFinite(n) && accept(n) ? n : fallback;
}

/** Normalize environment variables into a {@link Config}. Pure; no I/O. */
export function parseConfig(env: NodeJS.ProcessEnv): Config {
  // Chunk size trades recall (too large) against precision (too small).
  const CHUNK_SIZE = Math.min(8000, Math.floor(num(env.CHUNK_SIZE, 500, (n) => n > 0)));

  // Overlap must stay below the chunk size; otherwise fall back to 10% of it.
  let CHUNK_OVERLAP = Math.min(4000, Math.floor(num(env.CHUNK_OVERLAP, 50, (n) => n >= 0)));
  if (CHUNK_OVERLAP >= CHUNK_SIZE) {
    const fallback = Math.floor(CHUNK_SIZE * 0.1);
    console.error(
      `[Config] CHUNK_OVERLAP (=${CHUNK_OVERLAP}) >= CHUNK_SIZE (=${CHUNK_SIZE}). Using ${fallback}.`,
    );
    CHUNK_OVERLAP = fallback;
  }

  const TOP_K = Math.floor(num(env.TOP_K, 3, (n) => n >= 1 && n <= 50));
  const MIN_SIMILARITY = num(env.MIN_SIMILARITY, 0.3, (n) => n >= -1 && n <= 1);
  const CACHE_MAX_ENTRIES = Math.floor(num(env.CACHE_MAX_ENTRIES, 50, (n) => n >= 0));
  const MAX_TRANSCRIPT_CHARS = Math.floor(num(env.MAX_TRANSCRIPT_CHARS, 2_000_000, (n) => n > 0));
  const PORT = Math.floor(num(env.PORT, 5000, (n) => n > 0 && n < 65536));

  // Tolerant truthy parsing.
  const VERBOSE = (() => {
    const v = (env.VERBOSE ?? "").trim().toLowerCase();
    return v === "1" || v === "true" || v === "yes" || v === "on";
  })();

  const MCP_TRANSPORT: Transport =
    (env.MCP_TRANSPORT ?? "").trim().toLowerCase() === "stdio" ? "stdio" : "http";

  return {
    TRANSCRIPTS_DIR: env.TRANSCRIPTS_DIR?.trim() || "processed_transcripts",
    EMBEDDING_MODEL: env.EMBEDDING_MODEL?.trim() || DEFAULT_EMBEDDING_MODEL,
    TRANSFORMERS_CACHE: env.TRANSFORMERS_CACHE?.trim() || undefined,
    CHUNK_SIZE,
    CHUNK_OVERLAP,
    TOP_K,
    MIN_SIMILARITY,
    CACHE_MAX_ENTRIES,
    MAX_TRANSCRIPT_CHARS,
    GEMINI_API_KEY: env.GEMINI_API_KEY?.trim() || undefined,
    GEMINI_MODEL: env.GEMINI_MODEL?.trim() || "gemini-flash-latest",
    MCP_TRANSPORT,
    PORT,
    HOST: env.HOST?.trim() || "127.0.0.1",
    VERBOSE,
  };
}

/** Resolve configuration from the process environment. */
export function getConfig(): Config {
  return parseConfig(process.env);
}
