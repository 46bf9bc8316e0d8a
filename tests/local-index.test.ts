import fs from "node:fs/promises";
import path from "node:path";
import { beforeEach, describe, expect, it } from "vitest";
import { IndexCorruptError, InputRejectedError } from "../src/errors";
import { LocalVectorIndex } from "../src/store/local";
import { toRecord, type EmbeddingRecord } from "../src/types";
import { makeTempDir, oneHot, silentLogger } from "./helpers";

function record(documentId: string, index: number, vector: Float32Array): EmbeddingRecord {
  const text = `${documentId} part ${index}`;
  return toRecord({ documentId, index, text, start: index * 10, end: index * 10 + text.length }, vector);
}

function newIndex(storePath?: string, embedderId = "fake:test", dimension = 3): LocalVectorIndex {
  return new LocalVectorIndex({ storePath, embedderId, dimension, logger: silentLogger });
}

describe("LocalVectorIndex", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  it("ranks by cosine similarity and caps at topK", async () => {
    const index = newIndex();
    await index.upsert([
      record("a.txt", 0, new Float32Array([1, 0, 0])),
      record("b.txt", 0, new Float32Array([0, 1, 0])),
      record("c.txt", 0, new Float32Array([1, 1, 0])),
    ]);
    const matches = await index.query(new Float32Array([1, 0, 0]), 2);
    expect(matches.map((m) => m.record.id)).toEqual(["a.txt#chunk-0", "c.txt#chunk-0"]);
    expect(matches[0].score).toBeCloseTo(1, 6);
    expect(matches[1].score).toBeCloseTo(Math.SQRT1_2, 6);
  });

  it("breaks score ties by insertion order", async () => {
    const index = newIndex();
    await index.upsert([
      record("late.txt", 0, oneHot(3, 1)),
      record("early.txt", 0, oneHot(3, 0)),
      record("later.txt", 0, oneHot(3, 0)),
    ]);
    const matches = await index.query(oneHot(3, 0), 3);
    expect(matches.map((m) => m.record.metadata.documentId)).toEqual([
      "early.txt",
      "later.txt",
      "late.txt",
    ]);
  });

  it("is idempotent per id and keeps the original position on replace", async () => {
    const index = newIndex();
    await index.upsert([record("a.txt", 0, oneHot(3, 0)), record("b.txt", 0, oneHot(3, 0))]);
    await index.upsert([record("a.txt", 0, oneHot(3, 0))]);
    expect(await index.size()).toBe(2);
    const matches = await index.query(oneHot(3, 0), 2);
    expect(matches.map((m) => m.record.id)).toEqual(["a.txt#chunk-0", "b.txt#chunk-0"]);
  });

  it("deletes every record of a document and reports the count", async () => {
    const index = newIndex();
    await index.upsert([
      record("a.txt", 0, oneHot(3, 0)),
      record("a.txt", 1, oneHot(3, 1)),
      record("b.txt", 0, oneHot(3, 2)),
    ]);
    expect(await index.deleteByDocument("a.txt")).toBe(2);
    expect(await index.deleteByDocument("missing.txt")).toBe(0);
    expect(await index.documentIds()).toEqual(["b.txt"]);
    const matches = await index.query(oneHot(3, 0), 5);
    expect(matches.map((m) => m.record.id)).toEqual(["b.txt#chunk-0"]);
  });

  it("rejects vectors of the wrong dimension without partial writes", async () => {
    const index = newIndex();
    await expect(
      index.upsert([record("a.txt", 0, oneHot(3, 0)), record("a.txt", 1, new Float32Array(2))]),
    ).rejects.toBeInstanceOf(InputRejectedError);
    expect(await index.size()).toBe(0);
    await expect(index.query(new Float32Array(4), 1)).rejects.toBeInstanceOf(InputRejectedError);
  });

  it("replaces a document's records and leaves them alone when the new set is invalid", async () => {
    const index = newIndex();
    await index.upsert([
      record("a.txt", 0, oneHot(3, 0)),
      record("a.txt", 1, oneHot(3, 1)),
      record("b.txt", 0, oneHot(3, 2)),
    ]);

    await expect(
      index.replaceDocument("a.txt", [record("a.txt", 0, new Float32Array(2))]),
    ).rejects.toBeInstanceOf(InputRejectedError);
    expect(await index.size()).toBe(3);

    await index.replaceDocument("a.txt", [record("a.txt", 0, oneHot(3, 1))]);
    expect(await index.size()).toBe(2);
    const matches = await index.query(oneHot(3, 1), 5);
    expect(matches.map((m) => [m.record.id, m.score])).toEqual([
      ["a.txt#chunk-0", expect.closeTo(1, 6)],
      ["b.txt#chunk-0", 0],
    ]);
  });

  it("rejects a topK below one", async () => {
    const index = newIndex();
    await expect(index.query(oneHot(3, 0), 0)).rejects.toBeInstanceOf(InputRejectedError);
  });

  it("returns nothing from an empty index", async () => {
    expect(await newIndex().query(oneHot(3, 0), 3)).toEqual([]);
  });

  it("starts empty when the artifact does not exist", async () => {
    const index = newIndex(path.join(dir, "index.json"));
    await index.load();
    expect(await index.size()).toBe(0);
  });

  it("round-trips records through persist and load", async () => {
    const storePath = path.join(dir, "nested", "index.json");
    const first = newIndex(storePath);
    await first.upsert([
      record("a.txt", 0, new Float32Array([0.25, -0.5, 1])),
      record("b.txt", 0, oneHot(3, 2)),
    ]);
    await first.persist();

    const second = newIndex(storePath);
    await second.load();
    expect(await second.size()).toBe(2);
    const [top] = await second.query(new Float32Array([0.25, -0.5, 1]), 1);
    expect(top.record.id).toBe("a.txt#chunk-0");
    expect(Array.from(top.record.vector)).toEqual([0.25, -0.5, 1]);
    expect(top.record.metadata).toEqual({ documentId: "a.txt", chunkIndex: 0, start: 0, end: 12 });
    expect(await fs.readdir(path.dirname(storePath))).toEqual(["index.json"]);
  });

  it("raises IndexCorruptError for unparseable JSON", async () => {
    const storePath = path.join(dir, "index.json");
    await fs.writeFile(storePath, "{not json", "utf8");
    await expect(newIndex(storePath).load()).rejects.toBeInstanceOf(IndexCorruptError);
  });

  it("raises IndexCorruptError for an artifact from another embedder", async () => {
    const storePath = path.join(dir, "index.json");
    const first = newIndex(storePath, "fake:one");
    await first.upsert([record("a.txt", 0, oneHot(3, 0))]);
    await first.persist();
    await expect(newIndex(storePath, "fake:two").load()).rejects.toBeInstanceOf(IndexCorruptError);
    await expect(newIndex(storePath, "fake:one", 4).load()).rejects.toBeInstanceOf(
      IndexCorruptError,
    );
  });

  it("raises IndexCorruptError for a record with a truncated vector", async () => {
    const storePath = path.join(dir, "index.json");
    const artifact = {
      version: 1,
      meta: { embedder: "fake:test", dimension: 3, savedAt: "2026-01-01T00:00:00.000Z" },
      records: [
        { id: "a.txt#chunk-0", text: "a", documentId: "a.txt", chunkIndex: 0, start: 0, end: 1, emb: "AAAA" },
      ],
    };
    await fs.writeFile(storePath, JSON.stringify(artifact), "utf8");
    await expect(newIndex(storePath).load()).rejects.toThrow(/bad vector/);
  });
});
