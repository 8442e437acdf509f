import { z, ZodError } from "zod";
import { fromZodError } from "zod-validation-error";
import {
  Server,
  ListToolsRequestSchema,
  CallToolRequestSchema,
  ErrorCode,
  McpError,
  type CallToolResult,
  type Tool,
} from "./mcp-sdk";
import { APP_VERSION } from "./config";
import { NotFoundError, ValidationError } from "./errors";
import type { ChatService } from "./answer";
import type { StatusManager } from "./status";
import type { TranscriptStore } from "./transcripts";

export interface McpDeps {
  chat: ChatService;
  transcripts: TranscriptStore;
  status: StatusManager;
}

const transcriptIdArg = z.string().min(1);
const queryArgs = z.object({
  transcript_id: transcriptIdArg,
  query: z.string().min(1),
  top_k: z.number().int().min(1).max(50).optional(),
});
const readArgs = z.object({ transcript_id: transcriptIdArg });

const queryInputSchema: Tool["inputSchema"] = {
  type: "object",
  properties: {
    transcript_id: { type: "string", description: "Id of a stored meeting transcript." },
    query: {
      type: "string",
      description: "Natural language question about the meeting.",
    },
    top_k: {
      type: "number",
      description: "Number of candidate sections to retrieve (1-50). Server default if omitted.",
      minimum: 1,
      maximum: 50,
    },
  },
  required: ["transcript_id", "query"],
};

/** Static tool catalogue returned by tools/list. */
export const TOOLS: Tool[] = [
  {
    name: "transcript_context",
    description:
      "Retrieve the transcript sections most relevant to a question, formatted as one context block. Empty when nothing clears the relevance threshold.",
    inputSchema: queryInputSchema,
  },
  {
    name: "transcript_search",
    description:
      "Semantic search within one transcript. Returns ranked chunks with index, score and snippet, without threshold filtering.",
    inputSchema: queryInputSchema,
  },
  {
    name: "list_transcripts",
    description: "List the ids of all stored meeting transcripts.",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "read_transcript",
    description: "Read the full text of a stored meeting transcript.",
    inputSchema: {
      type: "object",
      properties: { transcript_id: { type: "string", description: "Transcript id." } },
      required: ["transcript_id"],
    },
  },
];

function text(value: string): CallToolResult {
  return { content: [{ type: "text", text: value }] };
}

function toMcpError(e: unknown): unknown {
  if (e instanceof ZodError) return new McpError(ErrorCode.InvalidParams, fromZodError(e).message);
  if (e instanceof ValidationError) return new McpError(ErrorCode.InvalidParams, e.message);
  if (e instanceof NotFoundError) return new McpError(ErrorCode.InvalidRequest, e.message);
  return e;
}

/**
 * Tool router, independent of any transport so it can be exercised directly.
 * Argument errors surface as InvalidParams, unknown transcripts as
 * InvalidRequest and unknown tool names as MethodNotFound.
 */
export function createToolHandler(deps: McpDeps) {
  const { chat, transcripts, status } = deps;

  return async (name: string, args: Record<string, unknown> = {}): Promise<CallToolResult> => {
    try {
      switch (name) {
        case "transcript_context": {
          const { transcript_id, query, top_k } = queryArgs.parse(args);
          status.countQuery();
          const context = await chat.context(transcript_id, query, top_k);
          return text(JSON.stringify({ transcript_id, context }));
        }
        case "transcript_search": {
          const { transcript_id, query, top_k } = queryArgs.parse(args);
          status.countQuery();
          const hits = await chat.search(transcript_id, query, top_k);
          const matches = hits.map((h) => ({
            index: h.index,
            score: Number(h.score.toFixed(4)),
            snippet: h.chunk,
          }));
          return text(JSON.stringify({ transcript_id, matches }));
        }
        case "list_transcripts":
          return text(JSON.stringify({ transcripts: await transcripts.list() }));
        case "read_transcript": {
          const { transcript_id } = readArgs.parse(args);
          return text(await transcripts.load(transcript_id));
        }
        default:
          throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
      }
    } catch (e) {
      throw toMcpError(e);
    }
  };
}

/**
 * Build a fresh MCP Server bound to the shared services. One server is made
 * per transport session; the index cache and model are shared across them.
 */
export function createMcpServer(deps: McpDeps): Server {
  const server = new Server(
    { name: "meeting-rag-server", version: APP_VERSION },
    { capabilities: { tools: {} } },
  );
  const callTool = createToolHandler(deps);

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));
  server.setRequestHandler(CallToolRequestSchema, async (req) =>
    callTool(req.params.name, req.params.arguments),
  );
  return server;
}
