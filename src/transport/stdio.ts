import { Server, StdioServerTransport } from "../mcp-sdk";

/**
 * Serve MCP over stdio. All logging goes to stderr, so stdout stays a clean
 * JSON-RPC channel.
 *
 * @param createServer Factory returning a new, unconnected MCP Server instance.
 */
export async function startStdioTransport(createServer: () => Server): Promise<void> {
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("[MCP] Serving over stdio");
}
