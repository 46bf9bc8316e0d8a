import { cosine } from "../embeddings/types";
import { IndexCorruptError, errorMessage } from "../errors";
import { getLogger, type Logger } from "../logger";
import { decodeVector, encodeVector, isRecord, readJsonFile, writeJsonFile } from "../persistence";
import type { EmbeddingRecord, QueryMatch } from "../types";
import { assertDimension, assertTopK, rankMatches, type VectorIndex } from "./types";

export interface LocalVectorIndexOptions {
  /** JSON artifact path. When omitted the index lives in memory only. */
  storePath?: string;
  /** Identity of the embedder whose vectors this index holds. */
  embedderId: string;
  dimension: number;
  logger?: Logger;
}

interface SerializedRecord {
  id: string;
  text: string;
  documentId: string;
  chunkIndex: number;
  start: number;
  end: number;
  /** base64 little-endian float32 */
  emb: string;
}

const ARTIFACT_VERSION = 1;

/**
 * In-process index persisted as one JSON file. Ranking is a full linear scan,
 * which is fine for a corpus of hundreds to low thousands of chunks.
 *
 * Records live in a Map, so iteration order is insertion order and replacing
 * an id keeps its original position (the tie-break order).
 */
export class LocalVectorIndex implements VectorIndex {
  public readonly kind = "local" as const;
  public readonly dimension: number;
  private readonly storePath?: string;
  private readonly embedderId: string;
  private readonly logger: Logger;
  private readonly records = new Map<string, EmbeddingRecord>();

  public constructor(options: LocalVectorIndexOptions) {
    this.storePath = options.storePath;
    this.embedderId = options.embedderId;
    this.dimension = options.dimension;
    this.logger = (options.logger ?? getLogger()).child({ module: "local-index" });
  }

  public async load(): Promise<void> {
    this.records.clear();
    if (!this.storePath) return;

    let parsed: unknown;
    try {
      parsed = await readJsonFile(this.storePath);
    } catch (err) {
      throw new IndexCorruptError(
        `Index artifact ${this.storePath} is unreadable: ${errorMessage(err)}`,
        err,
      );
    }
    if (parsed === undefined) {
      this.logger.info({ storePath: this.storePath }, "no persisted index; starting empty");
      return;
    }

    const records = this.decodeArtifact(parsed);
    for (const r of records) this.records.set(r.id, r);
    this.logger.info({ storePath: this.storePath, chunks: this.records.size }, "loaded index");
  }

  public async persist(): Promise<void> {
    if (!this.storePath) return;
    const out = {
      version: ARTIFACT_VERSION,
      meta: {
        embedder: this.embedderId,
        dimension: this.dimension,
        savedAt: new Date().toISOString(),
        embEncoding: "f32-base64",
      },
      records: Array.from(this.records.values(), (r): SerializedRecord => ({
        id: r.id,
        text: r.text,
        documentId: r.metadata.documentId,
        chunkIndex: r.metadata.chunkIndex,
        start: r.metadata.start,
        end: r.metadata.end,
        emb: encodeVector(r.vector),
      })),
    };
    await writeJsonFile(this.storePath, out);
    this.logger.debug({ storePath: this.storePath, chunks: out.records.length }, "persisted index");
  }

  public async upsert(records: readonly EmbeddingRecord[]): Promise<void> {
    // Validate the whole batch first so a bad record leaves the index untouched.
    for (const r of records) assertDimension(r.vector, this.dimension, `Record ${r.id}`);
    for (const r of records) this.records.set(r.id, r);
  }

  public async query(vector: Float32Array, topK: number): Promise<QueryMatch[]> {
    assertTopK(topK);
    assertDimension(vector, this.dimension, "Query vector");
    let seq = 0;
    const scored = Array.from(this.records.values(), (record) => ({
      record,
      score: cosine(record.vector, vector),
      seq: seq++,
    }));
    return rankMatches(scored, topK);
  }

  public async deleteByDocument(documentId: string): Promise<number> {
    let removed = 0;
    for (const [id, r] of this.records) {
      if (r.metadata.documentId === documentId) {
        this.records.delete(id);
        removed++;
      }
    }
    return removed;
  }

  public async replaceDocument(
    documentId: string,
    records: readonly EmbeddingRecord[],
  ): Promise<void> {
    for (const r of records) assertDimension(r.vector, this.dimension, `Record ${r.id}`);
    await this.deleteByDocument(documentId);
    for (const r of records) this.records.set(r.id, r);
  }

  public async documentIds(): Promise<string[]> {
    return [...new Set(Array.from(this.records.values(), (r) => r.metadata.documentId))];
  }

  public async size(): Promise<number> {
    return this.records.size;
  }

  public async clear(): Promise<void> {
    this.records.clear();
  }

  public async close(): Promise<void> {
    // Nothing held open between calls; file handles are scoped to load/persist.
  }

  private decodeArtifact(parsed: unknown): EmbeddingRecord[] {
    const where = this.storePath ?? "index";
    if (!isRecord(parsed) || !Array.isArray(parsed.records) || !isRecord(parsed.meta)) {
      throw new IndexCorruptError(`Index artifact ${where} has an unexpected shape`);
    }
    const meta = parsed.meta;
    if (parsed.version !== ARTIFACT_VERSION) {
      throw new IndexCorruptError(`Index artifact ${where} has unsupported version`);
    }
    if (meta.embedder !== this.embedderId || meta.dimension !== this.dimension) {
      throw new IndexCorruptError(
        `Index artifact ${where} was built by ${String(meta.embedder)} (${String(meta.dimension)}d); ` +
          `current embedder is ${this.embedderId} (${this.dimension}d)`,
      );
    }

    return parsed.records.map((raw: unknown, i): EmbeddingRecord => {
      if (
        !isRecord(raw) ||
        typeof raw.id !== "string" ||
        typeof raw.text !== "string" ||
        typeof raw.documentId !== "string" ||
        typeof raw.chunkIndex !== "number" ||
        typeof raw.start !== "number" ||
        typeof raw.end !== "number" ||
        typeof raw.emb !== "string"
      ) {
        throw new IndexCorruptError(`Index artifact ${where}: record ${i} is malformed`);
      }
      const vector = decodeVector(raw.emb);
      if (!vector || vector.length !== this.dimension) {
        throw new IndexCorruptError(`Index artifact ${where}: record ${raw.id} has a bad vector`);
      }
      return {
        id: raw.id,
        text: raw.text,
        vector,
        metadata: {
          documentId: raw.documentId,
          chunkIndex: raw.chunkIndex,
          start: raw.start,
          end: raw.end,
        },
      };
    });
  }
}
