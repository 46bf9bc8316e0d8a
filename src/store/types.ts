import { InputRejectedError } from "../errors";
import type { EmbeddingRecord, QueryMatch } from "../types";

/**
 * Storage for embedding records. Both backends expose the same ranking
 * contract: cosine similarity, descending, ties resolved by insertion order
 * (earlier wins), at most `topK` results.
 */
export interface VectorIndex {
  /** Backend label for logs and status. */
  readonly kind: "local" | "remote";
  /** Vector length accepted by this index. */
  readonly dimension: number;
  /**
   * Acquire the backing store and hydrate state. A missing store yields an
   * empty index.
   *
   * @throws {IndexCorruptError} if a store exists but cannot be used.
   */
  load(): Promise<void>;
  /** Flush state to durable storage. */
  persist(): Promise<void>;
  /** Insert or replace records by id. */
  upsert(records: readonly EmbeddingRecord[]): Promise<void>;
  query(vector: Float32Array, topK: number): Promise<QueryMatch[]>;
  /** Remove every record of a document; resolves to the number removed. */
  deleteByDocument(documentId: string): Promise<number>;
  /**
   * Make `records` the only records of `documentId`. A rejected call leaves
   * the document's previous records in place.
   */
  replaceDocument(documentId: string, records: readonly EmbeddingRecord[]): Promise<void>;
  /** Distinct document ids currently referenced by stored records. */
  documentIds(): Promise<string[]>;
  size(): Promise<number>;
  clear(): Promise<void>;
  /** Release the backing store. */
  close(): Promise<void>;
}

export function assertTopK(topK: number): void {
  if (!Number.isInteger(topK) || topK < 1) {
    throw new InputRejectedError(`topK must be a positive integer (got ${topK})`);
  }
}

export function assertDimension(vector: Float32Array, dimension: number, what: string): void {
  if (vector.length !== dimension) {
    throw new InputRejectedError(
      `${what} has ${vector.length} dimensions; this index stores ${dimension}`,
    );
  }
}

/**
 * Sort candidates by score (descending) then insertion sequence (ascending)
 * and keep the first `topK`.
 */
export function rankMatches(
  candidates: readonly (QueryMatch & { readonly seq: number })[],
  topK: number,
): QueryMatch[] {
  return [...candidates]
    .sort((a, b) => b.score - a.score || a.seq - b.seq)
    .slice(0, topK)
    .map(({ record, score }) => ({ record, score }));
}
