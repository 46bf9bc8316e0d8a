import type { Embedder } from "./embeddings/types";
import { BackendUnavailableError, InputRejectedError } from "./errors";
import type { RwLock } from "./lock";
import { getLogger, type Logger } from "./logger";
import { assertTopK, type VectorIndex } from "./store/types";
import type { QueryResult } from "./types";

export interface RetrieverOptions {
  /** Result cap used when a call does not pass one. */
  maxResults: number;
  /** Similarity floor used when a call does not pass one. */
  similarityFloor: number;
  /** Upper bound on query embedding time (default 10s). */
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Query-time half of the pipeline: embed the question, take the `topK`
 * nearest chunks, then drop those under the similarity floor. Read-only with
 * respect to the index.
 */
export class Retriever {
  private readonly maxResults: number;
  private readonly similarityFloor: number;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  public constructor(
    private readonly embedder: Embedder,
    private readonly index: VectorIndex,
    private readonly lock: RwLock,
    options: RetrieverOptions,
  ) {
    this.maxResults = options.maxResults;
    this.similarityFloor = options.similarityFloor;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.logger = (options.logger ?? getLogger()).child({ module: "retriever" });
  }

  /**
   * The floor is applied after ranking, so fewer than `topK` matches (or none)
   * is a normal outcome; results are never padded.
   *
   * @throws {InputRejectedError} for an empty query or invalid limits.
   * @throws {BackendUnavailableError} when embedding or search fails or times out.
   */
  public async retrieve(
    query: string,
    topK = this.maxResults,
    minScore = this.similarityFloor,
  ): Promise<QueryResult> {
    const text = query.trim();
    if (!text) throw new InputRejectedError("Query must not be empty");
    assertTopK(topK);
    if (!Number.isFinite(minScore)) {
      throw new InputRejectedError(`minScore must be a finite number (got ${minScore})`);
    }

    const vector = await this.embedWithTimeout(text);
    const ranked = await this.lock.read(() => this.index.query(vector, topK));
    const matches = ranked.filter((m) => m.score >= minScore);
    this.logger.debug(
      { topK, minScore, candidates: ranked.length, returned: matches.length },
      "query served",
    );
    return matches;
  }

  private async embedWithTimeout(text: string): Promise<Float32Array> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(
          new BackendUnavailableError(`Query embedding timed out after ${this.timeoutMs}ms`, {
            code: "timeout",
          }),
        );
        controller.abort();
      }, this.timeoutMs);
    });
    try {
      return await Promise.race([this.embedder.embed(text, { signal: controller.signal }), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
