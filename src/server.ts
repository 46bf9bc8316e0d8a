import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  type CallToolResult,
} from "@modelcontextprotocol/sdk/types.js";
import { APP_VERSION } from "./config";
import {
  BackendUnavailableError,
  GenerationBackendError,
  InputRejectedError,
  ReindexInProgressError,
  errorMessage,
} from "./errors";
import type { ReindexMode } from "./indexer";
import { getLogger, type Logger } from "./logger";
import type { CourseRagService } from "./service";
import { summarizeMatch } from "./types";

type ToolArgs = Record<string, unknown>;

function requireString(args: ToolArgs, name: string): string {
  const v = args[name];
  if (typeof v !== "string" || !v.trim()) {
    throw new McpError(ErrorCode.InvalidParams, `Missing ${name}`);
  }
  return v;
}

function optionalNumber(args: ToolArgs, name: string): number | undefined {
  const v = args[name];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "number" || !Number.isFinite(v)) {
    throw new McpError(ErrorCode.InvalidParams, `${name} must be a number`);
  }
  return v;
}

function readMode(args: ToolArgs): ReindexMode {
  const v = args.mode ?? "incremental";
  if (v === "incremental" || v === "full") return v;
  throw new McpError(ErrorCode.InvalidParams, `mode must be "incremental" or "full"`);
}

function jsonResult(value: unknown): CallToolResult {
  return { content: [{ type: "text", text: JSON.stringify(value, null, 2) }] };
}

/**
 * Map a service error onto the MCP surface: bad input is a protocol error the
 * client must fix; backend trouble is a tool-level error the model can read
 * and retry later.
 */
export function toToolFailure(err: unknown, logger: Logger): CallToolResult {
  if (err instanceof McpError) throw err;
  if (err instanceof InputRejectedError) {
    throw new McpError(ErrorCode.InvalidParams, err.message);
  }
  if (err instanceof BackendUnavailableError) {
    logger.warn({ err }, "backend unavailable while serving tool call");
    return {
      isError: true,
      content: [
        {
          type: "text",
          text: `The course search service is temporarily unavailable (${err.message}). Try again shortly.`,
        },
      ],
    };
  }
  if (err instanceof GenerationBackendError) {
    logger.warn({ err }, "answer generation failed");
    return {
      isError: true,
      content: [{ type: "text", text: `Could not compose an answer (${err.message}).` }],
    };
  }
  if (err instanceof ReindexInProgressError) {
    return { isError: true, content: [{ type: "text", text: err.message }] };
  }
  logger.error({ err }, "tool call failed");
  throw new McpError(ErrorCode.InternalError, errorMessage(err));
}

/**
 * Factory for a fresh MCP Server bound to the shared service. HTTP mode
 * creates one per session; all of them share the same index.
 *
 * Tools:
 *  course_search  { query, top_k?, min_score? } -> { matches: [{ id, document, chunk, score, text }] }
 *  course_answer  { query, top_k?, min_score? } -> { answer, declined, matches }
 *  reindex        { mode?: "incremental" | "full" } -> ReindexReport
 *  index_status   {} -> ServerStatus
 */
export function createServer(service: CourseRagService, logger: Logger = getLogger()): Server {
  const log = logger.child({ module: "mcp" });
  const server = new Server(
    { name: "course-rag-server", version: APP_VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: [
        {
          name: "course_search",
          description:
            "Semantically search the indexed course documents and return the most relevant chunks with their source document and similarity score. An empty list means nothing was relevant enough.",
          inputSchema: {
            type: "object",
            properties: {
              query: {
                type: "string",
                description: "Natural language question, e.g. 'prerequisites for CSCE 629'.",
              },
              top_k: {
                type: "number",
                description: "Maximum number of chunks to return. Defaults to MAX_RESULTS.",
                minimum: 1,
              },
              min_score: {
                type: "number",
                description: "Similarity floor in [-1, 1]. Defaults to SIMILARITY_FLOOR.",
              },
            },
            required: ["query"],
          },
        },
        {
          name: "course_answer",
          description:
            "Answer a question from the course documents. Returns the supporting chunks and, when no chunk is relevant, a fixed decline message with declined=true. answer is null when the server has no answer generator.",
          inputSchema: {
            type: "object",
            properties: {
              query: { type: "string", description: "Natural language question." },
              top_k: {
                type: "number",
                description: "Maximum number of context chunks. Defaults to MAX_RESULTS.",
                minimum: 1,
              },
              min_score: {
                type: "number",
                description: "Similarity floor in [-1, 1]. Defaults to SIMILARITY_FLOOR.",
              },
            },
            required: ["query"],
          },
        },
        {
          name: "reindex",
          description:
            "Re-scan the course document folder. 'incremental' re-embeds only new or modified documents; 'full' rebuilds everything.",
          inputSchema: {
            type: "object",
            properties: {
              mode: { type: "string", enum: ["incremental", "full"] },
            },
          },
        },
        {
          name: "index_status",
          description: "Report readiness, backends and indexing counters.",
          inputSchema: { type: "object", properties: {} },
        },
      ],
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (req): Promise<CallToolResult> => {
    const args: ToolArgs = req.params.arguments ?? {};
    try {
      switch (req.params.name) {
        case "course_search": {
          const query = requireString(args, "query");
          const matches = await service.retrieve(
            query,
            optionalNumber(args, "top_k"),
            optionalNumber(args, "min_score"),
          );
          return jsonResult({ matches: matches.map(summarizeMatch) });
        }
        case "course_answer": {
          const query = requireString(args, "query");
          const result = await service.answer(
            query,
            optionalNumber(args, "top_k"),
            optionalNumber(args, "min_score"),
          );
          return jsonResult({
            answer: result.answer,
            declined: result.declined,
            matches: result.matches.map(summarizeMatch),
          });
        }
        case "reindex":
          return jsonResult(await service.reindex(readMode(args)));
        case "index_status":
          return jsonResult(service.getStatus());
        default:
          throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${req.params.name}`);
      }
    } catch (err) {
      return toToolFailure(err, log);
    }
  });

  return server;
}
