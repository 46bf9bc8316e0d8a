/**
 * Streamable HTTP transport.
 *
 * Session model:
 *  - A client sends a JSON-RPC `initialize` request to POST /mcp WITHOUT an
 *    `mcp-session-id` header; a new transport + MCP Server pair is created and
 *    the SDK returns the generated session id in a response header.
 *  - Every later request for that session carries the same header.
 *  - When the transport closes the session is evicted.
 *
 * Endpoints:
 *  - POST /mcp          JSON-RPC requests (initial + subsequent).
 *  - GET  /mcp          Streaming / follow-up channel (delegated to transport).
 *  - DELETE /mcp        Session teardown.
 *  - GET  /health       Readiness + status snapshot (503 until the startup pass completes).
 *  - GET  /api/stats    Indexing counters.
 *  - POST /api/query    `{ query, top_k?, min_score? }`, returns `{ answer, declined, matches }`.
 *  - POST /api/reindex  `{ mode?: "incremental" | "full" }`, returns the reindex report.
 *
 * DNS rebinding protection is on unless ENABLE_DNS_REBINDING_PROTECTION=false;
 * allowed hosts default to localhost and the bound host unless ALLOWED_HOSTS is set.
 */
import express from "express";
import { randomUUID } from "node:crypto";
import type { Server as HttpServer } from "node:http";
import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import type { Logger } from "../logger";
import type { CourseRagService } from "../service";
import { createApiRouter } from "./routes";

export interface HttpTransportOptions {
  port: number;
  host: string;
  logger: Logger;
}

function allowedHosts(host: string, port: number): string[] {
  const configured = process.env.ALLOWED_HOSTS?.split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  if (configured && configured.length) return configured;
  return Array.from(
    new Set(["127.0.0.1", `127.0.0.1:${port}`, "localhost", `localhost:${port}`, host, `${host}:${port}`]),
  );
}

/**
 * Start Express with the MCP endpoint and the service routes.
 *
 * @param createServer Factory producing a new, unconnected MCP `Server` per session.
 * @returns The bound HTTP server, once listening.
 */
export async function startHttpTransport(
  createServer: () => Server,
  service: CourseRagService,
  { port, host, logger }: HttpTransportOptions,
): Promise<HttpServer> {
  const log = logger.child({ module: "http" });
  const app = express();
  app.use(express.json({ limit: "2mb" }));

  const transports: Record<string, StreamableHTTPServerTransport> = {};
  const hosts = allowedHosts(host, port);

  app.post("/mcp", async (req, res) => {
    try {
      const sessionId = req.header("mcp-session-id");
      let transport = sessionId ? transports[sessionId] : undefined;

      if (!transport && !sessionId && isInitializeRequest(req.body)) {
        const created = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (sid: string) => {
            transports[sid] = created;
            log.debug({ sessionId: sid }, "session opened");
          },
          enableDnsRebindingProtection:
            (process.env.ENABLE_DNS_REBINDING_PROTECTION ?? "true") !== "false",
          allowedHosts: hosts,
        });

        const server = createServer();
        let closing = false;
        created.onclose = () => {
          if (closing) return;
          closing = true;
          if (created.sessionId) delete transports[created.sessionId];
          // server.close() closes the transport again; detach first.
          created.onclose = undefined;
          server.close().catch((err: unknown) => log.warn({ err }, "failed to close MCP server"));
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
      log.error({ err }, "HTTP POST /mcp failed");
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: { code: -32603, message: "Internal server error" },
          id: null,
        });
      }
    }
  });

  const handleSessionRequest = async (req: express.Request, res: express.Response) => {
    const sessionId = req.header("mcp-session-id");
    const transport = sessionId ? transports[sessionId] : undefined;
    if (!transport) {
      res.status(400).send("Invalid or missing session ID");
      return;
    }
    try {
      await transport.handleRequest(req, res);
    } catch (err) {
      log.error({ err, method: req.method }, "HTTP /mcp session request failed");
      if (!res.headersSent) res.status(500).send("Internal server error");
    }
  };

  app.get("/mcp", handleSessionRequest);
  app.delete("/mcp", handleSessionRequest);

  app.use(createApiRouter(service, log));

  return new Promise<HttpServer>((resolve, reject) => {
    const listener = app.listen(port, host, () => {
      log.info({ url: `http://${host}:${port}/mcp` }, "streamable HTTP listening");
      resolve(listener);
    });
    listener.once("error", reject);
  });
}
