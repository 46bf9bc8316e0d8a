/**
 * A source document in the corpus folder. `id` is the path relative to the
 * corpus root using forward slashes, so it stays stable across platforms.
 */
export interface CourseDocument {
  readonly id: string;
  /** Absolute path on disk. */
  readonly absPath: string;
  /** Last modification time (ms since epoch) used for staleness checks. */
  readonly mtimeMs: number;
}

/**
 * A bounded window of a document's text. `text` always equals
 * `documentText.slice(start, end)`.
 */
export interface Chunk {
  readonly documentId: string;
  /** Sequential index within the document (0-based). */
  readonly index: number;
  readonly text: string;
  /** Character offset of the first character (inclusive). */
  readonly start: number;
  /** Character offset past the last character (exclusive). */
  readonly end: number;
}

export interface RecordMetadata {
  readonly documentId: string;
  readonly chunkIndex: number;
  readonly start: number;
  readonly end: number;
}

/** A chunk together with its embedding, as stored in a {@link VectorIndex}. */
export interface EmbeddingRecord {
  /** Synthetic chunk id, see {@link chunkId}. */
  readonly id: string;
  readonly text: string;
  readonly vector: Float32Array;
  readonly metadata: RecordMetadata;
}

export interface QueryMatch {
  readonly record: EmbeddingRecord;
  /** Cosine similarity in [-1, 1]. */
  readonly score: number;
}

/**
 * Matches ordered by descending score. An empty result means the index was
 * searched and nothing cleared the similarity floor.
 */
export type QueryResult = readonly QueryMatch[];

/** Build the synthetic id of a chunk. */
export function chunkId(documentId: string, chunkIndex: number): string {
  return `${documentId}#chunk-${chunkIndex}`;
}

/** Build a record from a chunk and its vector. */
export function toRecord(chunk: Chunk, vector: Float32Array): EmbeddingRecord {
  return {
    id: chunkId(chunk.documentId, chunk.index),
    text: chunk.text,
    vector,
    metadata: {
      documentId: chunk.documentId,
      chunkIndex: chunk.index,
      start: chunk.start,
      end: chunk.end,
    },
  };
}

/** Wire shape of a match in tool and HTTP responses; score rounded to 4 places. */
export interface MatchSummary {
  id: string;
  document: string;
  chunk: number;
  score: number;
  text: string;
}

export function summarizeMatch(m: QueryMatch): MatchSummary {
  return {
    id: m.record.id,
    document: m.record.metadata.documentId,
    chunk: m.record.metadata.chunkIndex,
    score: Number(m.score.toFixed(4)),
    text: m.record.text,
  };
}
