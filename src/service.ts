import path from "node:path";
import { Chunker } from "./chunker";
import type { Config } from "./config";
import { createEmbedder } from "./embeddings";
import type { Embedder } from "./embeddings/types";
import { IndexCorruptError } from "./errors";
import { FileTextExtractor, type TextExtractor } from "./extractor";
import { IndexManager, type ReindexMode, type ReindexReport } from "./indexer";
import { RwLock } from "./lock";
import { getLogger, type Logger } from "./logger";
import { Retriever } from "./retriever";
import { StatusTracker, type ServerStatus } from "./status";
import { createVectorIndex } from "./store";
import type { VectorIndex } from "./store/types";
import type { QueryResult } from "./types";

/** Composes the final reply from retrieved chunks (language-model call). */
export interface AnswerGenerator {
  /** @throws {GenerationBackendError} */
  generate(query: string, contextChunks: readonly string[]): Promise<string>;
}

export interface Answer {
  answer: string | null;
  matches: QueryResult;
  /** True when nothing cleared the similarity floor and the generator was skipped. */
  declined: boolean;
}

/** Returned instead of a generated answer when no chunk is relevant enough. */
export const DECLINE_MESSAGE =
  "I don't have specific information about that topic in the course documents. " +
  "Please try rephrasing your question or ask about a specific course.";

/** Collaborators that may be swapped out (tests, alternative backends). */
export interface ServiceDeps {
  embedder?: Embedder;
  index?: VectorIndex;
  extractor?: TextExtractor;
  generator?: AnswerGenerator;
  logger?: Logger;
}

/**
 * One corpus, one embedder, one index. Built once at startup and handed to
 * the transports; nothing here is module-global.
 */
export class CourseRagService {
  private readonly retriever: Retriever;

  private constructor(
    private readonly config: Config,
    private readonly embedder: Embedder,
    private readonly index: VectorIndex,
    public readonly manager: IndexManager,
    private readonly lock: RwLock,
    private readonly generator: AnswerGenerator | undefined,
    public readonly status: StatusTracker,
    private readonly logger: Logger,
  ) {
    this.retriever = new Retriever(embedder, index, lock, {
      maxResults: config.MAX_RESULTS,
      similarityFloor: config.SIMILARITY_FLOOR,
      timeoutMs: config.QUERY_TIMEOUT_MS,
      logger,
    });
  }

  /**
   * Build the service from configuration. The embedder is initialised here so
   * its dimension is known before the index is created.
   *
   * @throws {ConfigError} on invalid chunk parameters or missing backend settings.
   */
  public static async create(config: Config, deps: ServiceDeps = {}): Promise<CourseRagService> {
    const logger = deps.logger ?? getLogger();
    const chunker = new Chunker(config.CHUNK_SIZE, config.CHUNK_OVERLAP);
    const embedder = deps.embedder ?? (await createEmbedder(config, logger));
    await embedder.init();
    const index = deps.index ?? createVectorIndex(config, embedder, logger);
    const lock = new RwLock();
    const status = new StatusTracker({
      dataDir: config.DATA_DIR,
      embedder: embedder.id,
      embeddingBackend: config.EMBEDDING_BACKEND,
      storageBackend: config.STORAGE_BACKEND,
    });
    const manager = new IndexManager({
      root: config.DATA_DIR,
      allowedExt: config.ALLOWED_EXT,
      excludedFolders: config.EXCLUDED_FOLDERS,
      chunker,
      embedder,
      index,
      lock,
      extractor: deps.extractor ?? new FileTextExtractor(),
      manifestPath: path.join(config.CACHE_DIR, "manifest.json"),
      status,
      logger,
    });
    return new CourseRagService(
      config,
      embedder,
      index,
      manager,
      lock,
      deps.generator,
      status,
      logger,
    );
  }

  /**
   * Load persisted state and bring the index up to date with the corpus. An
   * unusable artifact is discarded and rebuilt from scratch.
   */
  public async start(): Promise<ReindexReport> {
    await this.manager.loadManifest();
    let report: ReindexReport;
    try {
      await this.index.load();
      report = await this.manager.reindexIncremental();
    } catch (err) {
      if (!(err instanceof IndexCorruptError)) throw err;
      this.logger.warn({ err }, "persisted index unusable; rebuilding from the corpus");
      await this.index.clear();
      report = await this.manager.reindexAll();
    }
    this.status.markReady();
    this.logger.info(
      { dataDir: this.config.DATA_DIR, embedder: this.embedder.id, index: this.index.kind },
      "course index ready",
    );
    return report;
  }

  public async retrieve(query: string, topK?: number, minScore?: number): Promise<QueryResult> {
    return this.retriever.retrieve(query, topK, minScore);
  }

  /**
   * Retrieve context and, when a generator is configured, compose an answer.
   * With no relevant chunks the generator is never called.
   */
  public async answer(query: string, topK?: number, minScore?: number): Promise<Answer> {
    const matches = await this.retriever.retrieve(query, topK, minScore);
    if (matches.length === 0) {
      return { answer: DECLINE_MESSAGE, matches, declined: true };
    }
    if (!this.generator) return { answer: null, matches, declined: false };
    const answer = await this.generator.generate(
      query.trim(),
      matches.map((m) => m.record.text),
    );
    return { answer, matches, declined: false };
  }

  /** @throws {ReindexInProgressError} when a pass is already running. */
  public async reindex(mode: ReindexMode = "incremental"): Promise<ReindexReport> {
    return mode === "full" ? this.manager.reindexAll() : this.manager.reindexIncremental();
  }

  public getStatus(): ServerStatus {
    return this.status.getStatus();
  }

  public async close(): Promise<void> {
    // Shared side: waits for in-flight queries, then releases the store.
    await this.lock.read(() => this.index.close());
  }
}
