/**
 * Application entry point.
 *
 * 1. Parse configuration (dotenv + environment) and configure the logger.
 * 2. Build the service: embedder (initialised eagerly), vector index, index manager.
 * 3. Load the persisted index and run an incremental pass over DATA_DIR, so
 *    unchanged documents cost no embedding calls.
 * 4. Serve MCP over stdio (default) or streamable HTTP
 *    (MCP_TRANSPORT=http|streamable-http), which also exposes /health,
 *    /api/stats, POST /api/query and POST /api/reindex.
 *
 * Business logic lives in CourseRagService; this file only wires it up.
 */
import { getConfig } from "./config";
import { configureLogger } from "./logger";
import { createServer } from "./server";
import { CourseRagService } from "./service";
import { startHttpTransport } from "./transport/http";
import { startStdioTransport } from "./transport/stdio";

const config = getConfig();
const logger = configureLogger({ level: config.LOG_LEVEL });

const service = await CourseRagService.create(config, { logger });
await service.start();

const useHttp = config.MCP_TRANSPORT === "http" || config.MCP_TRANSPORT === "streamable-http";
const factory = () => createServer(service, logger);

if (useHttp) {
  service.status.markTransport("http");
  await startHttpTransport(factory, service, {
    port: config.MCP_PORT,
    host: config.HOST,
    logger,
  });
} else {
  service.status.markTransport("stdio");
  await startStdioTransport(factory, logger);
}

const shutdown = (signal: string) => {
  logger.info({ signal }, "shutting down");
  service
    .close()
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      logger.error({ err }, "error during shutdown");
      process.exit(1);
    });
};
process.once("SIGINT", () => shutdown("SIGINT"));
process.once("SIGTERM", () => shutdown("SIGTERM"));
