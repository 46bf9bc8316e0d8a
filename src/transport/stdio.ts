import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Logger } from "../logger";

/**
 * Start the MCP stdio transport. stdout carries JSON-RPC frames, so all
 * logging must stay on stderr.
 *
 * @param createServer Factory returning a new, unconnected MCP Server instance.
 * @returns The connected server.
 */
export async function startStdioTransport(
  createServer: () => Server,
  logger: Logger,
): Promise<Server> {
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.child({ module: "stdio" }).info("MCP server connected over stdio");
  return server;
}
