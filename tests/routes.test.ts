import type { Server as HttpServer } from "node:http";
import express from "express";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { parseConfig } from "../src/config";
import { GenerationBackendError } from "../src/errors";
import { CourseRagService, DECLINE_MESSAGE, type AnswerGenerator } from "../src/service";
import { createApiRouter } from "../src/transport/routes";
import { FakeEmbedder, makeTempDir, silentLogger, writeDoc } from "./helpers";

const SENTENCE = "CSCE 629 requires CSCE 221 and CSCE 222.";

describe("REST routes", () => {
  let dataDir: string;
  let cacheDir: string;
  let server: HttpServer | undefined;
  let baseUrl = "";

  beforeEach(async () => {
    dataDir = await makeTempDir("course-docs-");
    cacheDir = await makeTempDir("course-cache-");
    await writeDoc(dataDir, "csce629.txt", SENTENCE);
  });

  afterEach(async () => {
    const running = server;
    server = undefined;
    if (!running) return;
    await new Promise<void>((resolve, reject) => {
      running.close((err) => (err ? reject(err) : resolve()));
    });
  });

  async function serve(generator?: AnswerGenerator): Promise<void> {
    const config = parseConfig({
      DATA_DIR: dataDir,
      CACHE_DIR: cacheDir,
      CHUNK_SIZE: "40",
      CHUNK_OVERLAP: "10",
    });
    const service = await CourseRagService.create(config, {
      embedder: new FakeEmbedder(),
      generator,
      logger: silentLogger,
    });
    await service.start();
    const app = express();
    app.use(express.json());
    app.use(createApiRouter(service, silentLogger));
    const listening = await new Promise<HttpServer>((resolve) => {
      const s = app.listen(0, "127.0.0.1", () => resolve(s));
    });
    server = listening;
    const address = listening.address();
    if (address === null || typeof address === "string") throw new Error("server has no port");
    baseUrl = `http://127.0.0.1:${address.port}`;
  }

  function postQuery(body: unknown): Promise<Response> {
    return fetch(`${baseUrl}/api/query`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(body),
    });
  }

  it("answers a question from the indexed chunks", async () => {
    await serve({ generate: async (_query, chunks) => `from ${chunks.length} chunk(s)` });
    const res = await postQuery({ query: "prerequisites for CSCE 629", top_k: 2 });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      answer: "from 1 chunk(s)",
      declined: false,
      matches: [
        {
          id: "csce629.txt#chunk-0",
          document: "csce629.txt",
          chunk: 0,
          score: 0.5345,
          text: SENTENCE,
        },
      ],
    });
  });

  it("returns the decline message when nothing is relevant", async () => {
    await serve();
    const res = await postQuery({ query: "parking permits" });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ answer: DECLINE_MESSAGE, declined: true, matches: [] });
  });

  it("rejects a request without a query", async () => {
    await serve();
    const res = await postQuery({ top_k: 3 });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "input_rejected", message: "Missing query" });
  });

  it("rejects a non-numeric top_k", async () => {
    await serve();
    const res = await postQuery({ query: "CSCE 629", top_k: "three" });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "input_rejected", message: "top_k must be a number" });
  });

  it("reports a failed generator as a bad gateway", async () => {
    await serve({
      generate: async () => {
        throw new GenerationBackendError("model offline");
      },
    });
    const res = await postQuery({ query: "CSCE 629" });
    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({ error: "generation_backend", message: "model offline" });
  });
});
