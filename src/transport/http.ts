/**
 * HTTP surface: a small JSON API for transcript submission and chat, the MCP
 * streamable HTTP endpoint, and /health.
 *
 * Endpoints:
 *  - GET  /health            : status snapshot (model, transport, cache, counters).
 *  - POST /transcripts       : { transcript, transcript_id?, structure? } -> 201 { transcript_id }.
 *                              `structure: true` rewrites raw text with the model before saving.
 *  - GET  /transcripts       : ids of stored transcripts.
 *  - GET  /transcripts/:id   : full transcript text.
 *  - POST /context           : { transcript_id, query, top_k?, min_similarity? } -> { context }.
 *  - POST /chat              : { transcript_id, query } -> { answer }.
 *  - POST|GET|DELETE /mcp    : MCP sessions (one Server + transport per session id).
 *
 * MCP session model: a client opens a session by POSTing an `initialize`
 * request without an `mcp-session-id` header; later requests carry the id the
 * SDK hands back. Closed sessions are dropped from the in-memory map.
 *
 * Environment: ALLOWED_HOSTS (comma list of host[:port]) and
 * ENABLE_DNS_REBINDING_PROTECTION ("false" disables) tune the MCP endpoint.
 */
import express from "express";
import { randomUUID } from "node:crypto";
import { z } from "zod";
import { Server, StreamableHTTPServerTransport, isInitializeRequest } from "../mcp-sdk";
import { handleRouteError } from "../errors";
import type { ChatService } from "../answer";
import type { StatusManager } from "../status";
import type { TranscriptStore } from "../transcripts";

export interface HttpDeps {
  chat: ChatService;
  transcripts: TranscriptStore;
  status: StatusManager;
  createMcpServer: () => Server;
  maxTranscriptChars: number;
  port: number;
  host: string;
}

const transcriptId = z.string().min(1, "Missing transcript_id");
const query = z.string().trim().min(1, "Missing query");

function sessionHeader(req: express.Request): string | undefined {
  const v = req.headers["mcp-session-id"];
  return typeof v === "string" ? v : undefined;
}

/** Build the express app. Does not listen; see {@link startHttpTransport}. */
export function createHttpApp(deps: HttpDeps): express.Express {
  const { chat, transcripts, status } = deps;
  const app = express();
  app.use(express.json({ limit: "10mb" }));

  const submitBody = z.object({
    transcript: z.string().trim().min(1, "Missing transcript").max(deps.maxTranscriptChars),
    transcript_id: transcriptId.optional(),
    structure: z.boolean().optional(),
  });
  const chatBody = z.object({ transcript_id: transcriptId, query });
  const contextBody = chatBody.extend({
    top_k: z.number().int().min(1).max(50).optional(),
    min_similarity: z.number().min(-1).max(1).optional(),
  });

  app.get("/health", (_req, res) => {
    res.json({ status: status.getStatus().ready ? "healthy" : "starting", ...status.getStatus() });
  });

  app.post("/transcripts", async (req, res) => {
    try {
      const body = submitBody.parse(req.body);
      const id = await chat.submit(body.transcript, body.transcript_id, body.structure ?? false);
      res.status(201).json({ success: true, transcript_id: id });
    } catch (e) {
      handleRouteError(res, e, "HTTP");
    }
  });

  app.get("/transcripts", async (_req, res) => {
    try {
      res.json({ success: true, transcripts: await transcripts.list() });
    } catch (e) {
      handleRouteError(res, e, "HTTP");
    }
  });

  app.get("/transcripts/:id", async (req, res) => {
    try {
      const text = await transcripts.load(req.params.id);
      res.json({ success: true, transcript_id: req.params.id, transcript: text });
    } catch (e) {
      handleRouteError(res, e, "HTTP");
    }
  });

  app.post("/context", async (req, res) => {
    try {
      const body = contextBody.parse(req.body);
      status.countQuery();
      const context = await chat.context(body.transcript_id, body.query, body.top_k, body.min_similarity);
      res.json({ success: true, transcript_id: body.transcript_id, context });
    } catch (e) {
      handleRouteError(res, e, "HTTP");
    }
  });

  app.post("/chat", async (req, res) => {
    try {
      const body = chatBody.parse(req.body);
      status.countQuery();
      const { answer, grounded } = await chat.ask(body.transcript_id, body.query);
      status.countAnswer(grounded);
      res.json({ success: true, answer, transcript_id: body.transcript_id });
    } catch (e) {
      handleRouteError(res, e, "Chat");
    }
  });

  mountMcp(app, deps);
  return app;
}

/** Wire the per-session MCP streamable HTTP endpoint onto `app`. */
function mountMcp(app: express.Express, deps: HttpDeps): void {
  const { port, host } = deps;
  const defaultAllowedHosts = Array.from(
    new Set([
      "127.0.0.1",
      `127.0.0.1:${port}`,
      "localhost",
      `localhost:${port}`,
      host,
      `${host}:${port}`,
    ]),
  );

  /** Active session transports mapped by session id. */
  const transports = new Map<string, StreamableHTTPServerTransport>();

  app.post("/mcp", async (req, res) => {
    try {
      const sessionId = sessionHeader(req);
      let transport = sessionId ? transports.get(sessionId) : undefined;

      // Session creation: only when no header AND the body is an initialize request.
      if (!transport && !sessionId && isInitializeRequest(req.body)) {
        const created = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (sid: string) => {
            transports.set(sid, created);
          },
          enableDnsRebindingProtection:
            (process.env.ENABLE_DNS_REBINDING_PROTECTION ?? "true") !== "false",
          allowedHosts: (process.env.ALLOWED_HOSTS ?? defaultAllowedHosts.join(","))
            .split(",")
            .map((s) => s.trim())
            .filter(Boolean),
        });

        const server = deps.createMcpServer();
        let closing = false;
        created.onclose = () => {
          if (closing) return;
          closing = true;
          if (created.sessionId) transports.delete(created.sessionId);
          // Detach first: server.close() closes the transport, which would re-enter here.
          created.onclose = undefined;
          server.close().catch((e: unknown) => console.error("[HTTP] MCP server close failed:", e));
        };
        await server.connect(created);
        transport = created;
      }

      if (!transport) {
        res.status(400).json({
          jsonrpc: "2.0",
          error: { code: -32000, message: "Bad Request: No valid session ID provided" },
          id: null,
        });
        return;
      }

      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      console.error("[HTTP] MCP POST error:", err);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: { code: -32603, message: "Internal server error" },
          id: null,
        });
      }
    }
  });

  // GET streams and DELETE teardown only make sense for an existing session.
  const handleSessionRequest = async (req: express.Request, res: express.Response) => {
    const sessionId = sessionHeader(req);
    const transport = sessionId ? transports.get(sessionId) : undefined;
    if (!transport) {
      res.status(400).send("Invalid or missing session ID");
      return;
    }
    try {
      await transport.handleRequest(req, res);
    } catch (err) {
      console.error("[HTTP] MCP session error:", err);
      if (!res.headersSent) res.status(500).send("Internal server error");
    }
  };

  app.get("/mcp", handleSessionRequest);
  app.delete("/mcp", handleSessionRequest);
}

/** Start listening; resolves once the port is bound. */
export async function startHttpTransport(deps: HttpDeps): Promise<void> {
  const app = createHttpApp(deps);
  await new Promise<void>((resolve, reject) => {
    const listener = app.listen(deps.port, deps.host, () => {
      console.error(`[HTTP] Listening at http://${deps.host}:${deps.port} (MCP at /mcp)`);
      resolve();
    });
    listener.on("error", reject);
  });
}
