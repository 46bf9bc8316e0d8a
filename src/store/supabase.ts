import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import WebSocket from "ws";
import { APP_VERSION, type SupabaseSettings } from "../config";
import { BackendUnavailableError, IndexCorruptError } from "../errors";
import { getLogger, type Logger } from "../logger";
import { isRecord } from "../persistence";
import type { EmbeddingRecord, QueryMatch } from "../types";
import { assertDimension, assertTopK, rankMatches, type VectorIndex } from "./types";

export interface SupabaseVectorIndexOptions {
  embedderId: string;
  dimension: number;
  logger?: Logger;
  /** Custom fetch for the underlying client (proxies, tests). */
  fetch?: typeof fetch;
}

interface ChunkRow {
  id: string;
  document_id: string;
  chunk_index: number;
  start_offset: number;
  end_offset: number;
  content: string;
  embedding: number[];
  embedder: string;
}

const UPSERT_BATCH = 50;
const PAGE_SIZE = 1000;

/** pgvector columns come back as `"[0.1,0.2,...]"` through PostgREST. */
function parseEmbedding(value: unknown): Float32Array | null {
  let arr: unknown = value;
  if (typeof value === "string") {
    try {
      arr = JSON.parse(value);
    } catch {
      return null;
    }
  }
  if (!Array.isArray(arr) || !arr.every((n) => typeof n === "number")) return null;
  return Float32Array.from(arr);
}

function malformedRow(): BackendUnavailableError {
  return new BackendUnavailableError("Vector store returned a malformed match row", {
    retryable: false,
  });
}

function toMatch(row: unknown): QueryMatch & { seq: number } {
  if (
    !isRecord(row) ||
    typeof row.id !== "string" ||
    typeof row.document_id !== "string" ||
    typeof row.chunk_index !== "number" ||
    typeof row.start_offset !== "number" ||
    typeof row.end_offset !== "number" ||
    typeof row.content !== "string" ||
    typeof row.similarity !== "number" ||
    typeof row.seq !== "number"
  ) {
    throw malformedRow();
  }
  const vector = parseEmbedding(row.embedding);
  if (!vector) throw malformedRow();
  return {
    record: {
      id: row.id,
      text: row.content,
      vector,
      metadata: {
        documentId: row.document_id,
        chunkIndex: row.chunk_index,
        start: row.start_offset,
        end: row.end_offset,
      },
    },
    score: row.similarity,
    seq: row.seq,
  };
}

/**
 * Vector index stored in a Supabase (Postgres + pgvector) table. Nearest
 * neighbour search runs server-side in the match function from
 * `sql/schema.sql`; results are re-ranked client-side so ordering and
 * tie-breaking match {@link LocalVectorIndex} exactly.
 */
export class SupabaseVectorIndex implements VectorIndex {
  public readonly kind = "remote" as const;
  public readonly dimension: number;
  private readonly embedderId: string;
  private readonly logger: Logger;
  private readonly client: SupabaseClient;

  public constructor(
    private readonly settings: SupabaseSettings,
    options: SupabaseVectorIndexOptions,
  ) {
    this.embedderId = options.embedderId;
    this.dimension = options.dimension;
    this.logger = (options.logger ?? getLogger()).child({ module: "supabase-index" });
    this.client = createClient(settings.url, settings.serviceRoleKey, {
      auth: { persistSession: false },
      // Node 20 has no global WebSocket; the realtime client refuses to start without one.
      realtime: { transport: WebSocket },
      global: {
        headers: { "X-Client-Info": `course-rag-server/${APP_VERSION}` },
        ...(options.fetch ? { fetch: options.fetch } : {}),
      },
    });
  }

  /** Verify the table is reachable and holds no vectors from another embedder. */
  public async load(): Promise<void> {
    const { data, error } = await this.client
      .from(this.settings.table)
      .select("id, embedder")
      .neq("embedder", this.embedderId)
      .limit(1);
    if (error) {
      throw new BackendUnavailableError(
        `Failed to reach table "${this.settings.table}": ${error.message}`,
      );
    }
    if ((data ?? []).length > 0) {
      throw new IndexCorruptError(
        `Table "${this.settings.table}" holds vectors from another embedder than ${this.embedderId}`,
      );
    }
    this.logger.info({ table: this.settings.table }, "connected to vector table");
  }

  /** Writes are durable as soon as {@link upsert} resolves. */
  public async persist(): Promise<void> {}

  public async upsert(records: readonly EmbeddingRecord[]): Promise<void> {
    for (const r of records) assertDimension(r.vector, this.dimension, `Record ${r.id}`);
    for (let i = 0; i < records.length; i += UPSERT_BATCH) {
      const rows = records.slice(i, i + UPSERT_BATCH).map(
        (r): ChunkRow => ({
          id: r.id,
          document_id: r.metadata.documentId,
          chunk_index: r.metadata.chunkIndex,
          start_offset: r.metadata.start,
          end_offset: r.metadata.end,
          content: r.text,
          embedding: Array.from(r.vector),
          embedder: this.embedderId,
        }),
      );
      const { error } = await this.client
        .from(this.settings.table)
        .upsert(rows, { onConflict: "id" });
      if (error) throw new BackendUnavailableError(`Failed to upsert chunks: ${error.message}`);
    }
  }

  public async query(vector: Float32Array, topK: number): Promise<QueryMatch[]> {
    assertTopK(topK);
    assertDimension(vector, this.dimension, "Query vector");
    const { data, error } = await this.client.rpc(this.settings.matchFunction, {
      query_embedding: Array.from(vector),
      match_count: topK,
    });
    if (error) {
      throw new BackendUnavailableError(
        `Failed to execute ${this.settings.matchFunction}: ${error.message}`,
      );
    }
    const rows: unknown = data ?? [];
    if (!Array.isArray(rows)) {
      throw new BackendUnavailableError(`${this.settings.matchFunction} did not return rows`, {
        retryable: false,
      });
    }
    return rankMatches(rows.map(toMatch), topK);
  }

  public async deleteByDocument(documentId: string): Promise<number> {
    const { error, count } = await this.client
      .from(this.settings.table)
      .delete({ count: "exact" })
      .eq("document_id", documentId);
    if (error) {
      throw new BackendUnavailableError(
        `Failed to delete chunks for ${documentId}: ${error.message}`,
      );
    }
    return count ?? 0;
  }

  /**
   * Upsert first, then drop the document's rows that are not part of the new
   * set. A failed upsert leaves the old rows in place.
   */
  public async replaceDocument(
    documentId: string,
    records: readonly EmbeddingRecord[],
  ): Promise<void> {
    if (records.length === 0) {
      await this.deleteByDocument(documentId);
      return;
    }
    await this.upsert(records);
    const keep = records.map((r) => `"${r.id.replace(/["\\]/g, "\\$&")}"`).join(",");
    const { error } = await this.client
      .from(this.settings.table)
      .delete()
      .eq("document_id", documentId)
      .not("id", "in", `(${keep})`);
    if (error) {
      throw new BackendUnavailableError(
        `Failed to drop stale chunks for ${documentId}: ${error.message}`,
      );
    }
  }

  public async documentIds(): Promise<string[]> {
    const ids = new Set<string>();
    for (let from = 0; ; from += PAGE_SIZE) {
      const { data, error } = await this.client
        .from(this.settings.table)
        .select("document_id")
        .order("seq", { ascending: true })
        .range(from, from + PAGE_SIZE - 1);
      if (error) throw new BackendUnavailableError(`Failed to list documents: ${error.message}`);
      const rows: unknown[] = data ?? [];
      for (const row of rows) {
        if (isRecord(row) && typeof row.document_id === "string") ids.add(row.document_id);
      }
      if (rows.length < PAGE_SIZE) break;
    }
    return [...ids];
  }

  public async size(): Promise<number> {
    const { count, error } = await this.client
      .from(this.settings.table)
      .select("id", { count: "exact", head: true });
    if (error) throw new BackendUnavailableError(`Failed to count chunks: ${error.message}`);
    return count ?? 0;
  }

  public async clear(): Promise<void> {
    const { error } = await this.client.from(this.settings.table).delete().neq("id", "");
    if (error) throw new BackendUnavailableError(`Failed to clear table: ${error.message}`);
  }

  public async close(): Promise<void> {
    await this.client.removeAllChannels();
  }
}
