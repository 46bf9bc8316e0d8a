import { describe, expect, it } from "vitest";
import { BackendUnavailableError, InputRejectedError } from "../src/errors";
import { RwLock } from "../src/lock";
import { Retriever } from "../src/retriever";
import { LocalVectorIndex } from "../src/store/local";
import { toRecord } from "../src/types";
import { FakeEmbedder, silentLogger, vectorize } from "./helpers";

async function buildIndex(embedder: FakeEmbedder, texts: Record<string, string>) {
  const index = new LocalVectorIndex({
    embedderId: embedder.id,
    dimension: embedder.dimension,
    logger: silentLogger,
  });
  await index.upsert(
    Object.entries(texts).map(([documentId, text]) =>
      toRecord({ documentId, index: 0, text, start: 0, end: text.length }, vectorize(text)),
    ),
  );
  return index;
}

function retriever(
  embedder: FakeEmbedder,
  index: LocalVectorIndex,
  overrides: { maxResults?: number; similarityFloor?: number; timeoutMs?: number } = {},
): Retriever {
  return new Retriever(embedder, index, new RwLock(), {
    maxResults: overrides.maxResults ?? 3,
    similarityFloor: overrides.similarityFloor ?? 0.1,
    timeoutMs: overrides.timeoutMs,
    logger: silentLogger,
  });
}

const CORPUS = {
  "csce629.txt": "CSCE 629 requires CSCE 221 and CSCE 222.",
  "csce222.txt": "CSCE 222",
  "csce221.txt": "CSCE 221",
  "misc.txt": "Office hours and exams",
};

describe("Retriever", () => {
  it("returns matches in descending score order", async () => {
    const embedder = new FakeEmbedder();
    const index = await buildIndex(embedder, CORPUS);
    const matches = await retriever(embedder, index).retrieve("prerequisites for CSCE 629");

    // query = csce + 629 + prerequisites + for; csce629 scores 4/(2*sqrt(14)),
    // the single-course files 1/(2*sqrt(2)); misc shares no term.
    expect(matches.map((m) => m.record.metadata.documentId)).toEqual([
      "csce629.txt",
      "csce222.txt",
      "csce221.txt",
    ]);
    expect(matches[0].score).toBeCloseTo(4 / (2 * Math.sqrt(14)), 5);
    expect(matches[1].score).toBeCloseTo(1 / (2 * Math.SQRT2), 5);
  });

  it("caps results at topK", async () => {
    const embedder = new FakeEmbedder();
    const index = await buildIndex(embedder, CORPUS);
    const matches = await retriever(embedder, index).retrieve("CSCE", 2);
    expect(matches).toHaveLength(2);
  });

  it("filters by the similarity floor without padding", async () => {
    const embedder = new FakeEmbedder();
    const index = await buildIndex(embedder, CORPUS);
    const r = retriever(embedder, index);
    const matches = await r.retrieve("prerequisites for CSCE 629", 3, 0.5);
    expect(matches.map((m) => m.record.metadata.documentId)).toEqual(["csce629.txt"]);
    expect(await r.retrieve("prerequisites for CSCE 629", 3, 0.99)).toEqual([]);
  });

  it("returns an empty result for an empty corpus", async () => {
    const embedder = new FakeEmbedder();
    const index = await buildIndex(embedder, {});
    expect(await retriever(embedder, index).retrieve("CSCE 629")).toEqual([]);
  });

  it("rejects an empty query without embedding it", async () => {
    const embedder = new FakeEmbedder();
    const index = await buildIndex(embedder, CORPUS);
    await expect(retriever(embedder, index).retrieve("   ")).rejects.toBeInstanceOf(
      InputRejectedError,
    );
    expect(embedder.embedCalls).toBe(0);
  });

  it("rejects invalid limits", async () => {
    const embedder = new FakeEmbedder();
    const index = await buildIndex(embedder, CORPUS);
    const r = retriever(embedder, index);
    await expect(r.retrieve("CSCE", 0)).rejects.toBeInstanceOf(InputRejectedError);
    await expect(r.retrieve("CSCE", 3, Number.NaN)).rejects.toBeInstanceOf(InputRejectedError);
  });

  it("times out a slow query embedding", async () => {
    const embedder = new FakeEmbedder({ delayMs: 500 });
    const index = await buildIndex(new FakeEmbedder(), CORPUS);
    const err: unknown = await retriever(embedder, index, { timeoutMs: 20 })
      .retrieve("CSCE 629")
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(BackendUnavailableError);
    expect(err).toMatchObject({ code: "timeout" });
  });

  it("does not modify the index", async () => {
    const embedder = new FakeEmbedder();
    const index = await buildIndex(embedder, CORPUS);
    await retriever(embedder, index).retrieve("CSCE 629");
    expect(await index.size()).toBe(4);
  });
});
