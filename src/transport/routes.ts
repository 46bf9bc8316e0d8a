import { Router, type Response } from "express";
import {
  BackendUnavailableError,
  CourseRagError,
  GenerationBackendError,
  InputRejectedError,
  ReindexInProgressError,
  errorMessage,
} from "../errors";
import type { Logger } from "../logger";
import { isRecord } from "../persistence";
import type { CourseRagService } from "../service";
import { summarizeMatch } from "../types";

/** HTTP status for an error raised by the service. */
export function httpStatusFor(err: unknown): number {
  if (err instanceof InputRejectedError) return 400;
  if (err instanceof BackendUnavailableError) return 503;
  if (err instanceof GenerationBackendError) return 502;
  if (err instanceof ReindexInProgressError) return 409;
  return 500;
}

function sendError(res: Response, err: unknown, logger: Logger): void {
  const status = httpStatusFor(err);
  if (status === 500) logger.error({ err }, "request failed");
  else logger.warn({ err }, "request rejected");
  res.status(status).json({
    error: err instanceof CourseRagError ? err.code : "internal",
    message: status === 500 ? "Internal server error" : errorMessage(err),
  });
}

function optionalNumber(body: Record<string, unknown>, name: string): number | undefined {
  const v = body[name];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "number" || !Number.isFinite(v)) {
    throw new InputRejectedError(`${name} must be a number`);
  }
  return v;
}

/** `/health`, `/api/stats`, `POST /api/query` and `POST /api/reindex`. */
export function createApiRouter(service: CourseRagService, logger: Logger): Router {
  const router = Router();

  router.get("/health", (_req, res) => {
    const status = service.getStatus();
    res.status(status.ready ? 200 : 503).json(status);
  });

  router.get("/api/stats", (_req, res) => {
    const { indexing, embedder, embeddingBackend, storageBackend, ready } = service.getStatus();
    res.json({ ready, embedder, embeddingBackend, storageBackend, ...indexing });
  });

  router.post("/api/query", async (req, res) => {
    const body: unknown = req.body;
    try {
      if (!isRecord(body) || typeof body.query !== "string") {
        throw new InputRejectedError("Missing query");
      }
      const result = await service.answer(
        body.query,
        optionalNumber(body, "top_k"),
        optionalNumber(body, "min_score"),
      );
      res.json({
        answer: result.answer,
        declined: result.declined,
        matches: result.matches.map(summarizeMatch),
      });
    } catch (err) {
      sendError(res, err, logger);
    }
  });

  router.post("/api/reindex", async (req, res) => {
    const body: unknown = req.body;
    const raw =
      typeof body === "object" && body !== null && "mode" in body ? body.mode : "incremental";
    if (raw !== "incremental" && raw !== "full") {
      res.status(400).json({ error: "input_rejected", message: 'mode must be "incremental" or "full"' });
      return;
    }
    try {
      res.json(await service.reindex(raw));
    } catch (err) {
      sendError(res, err, logger);
    }
  });

  return router;
}
