import { APP_VERSION } from "./config";

/** Counters describing the state of the index after the last pass. */
export interface IndexingStatus {
  /** Documents found in the corpus folder during the last scan. */
  documentsDiscovered: number;
  /** Documents whose chunks are currently in the index. */
  documentsIndexed: number;
  /** Records currently stored in the vector index. */
  chunksTotal: number;
  /** Chunks embedded since the process started. */
  chunksEmbedded: number;
  /** True while a reindex pass runs. */
  reindexing: boolean;
  lastReindex: LastReindex | null;
}

export interface LastReindex {
  mode: "incremental" | "full";
  finishedAt: string;
  indexed: number;
  skipped: number;
  removed: number;
  failed: number;
  durationMs: number;
}

/**
 * Snapshot of server lifecycle + indexing progress, served by `/health`,
 * `/api/stats` and the `index_status` tool.
 *
 * ready = true once the startup index pass completed.
 */
export interface ServerStatus {
  version: string;
  dataDir: string;
  embedder: string;
  embeddingBackend: string;
  storageBackend: string;
  /** Active transport in use: 'stdio' | 'http' | 'unknown'. */
  transport: string;
  ready: boolean;
  startedAt: string;
  indexing: IndexingStatus;
}

/**
 * Owner of the mutable status object. One instance per service; callers get
 * copies so they cannot mutate it.
 */
export class StatusTracker {
  private readonly data: ServerStatus;

  public constructor(initial?: Partial<Omit<ServerStatus, "indexing">>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      dataDir: initial?.dataDir ?? "",
      embedder: initial?.embedder ?? "",
      embeddingBackend: initial?.embeddingBackend ?? "",
      storageBackend: initial?.storageBackend ?? "",
      transport: initial?.transport ?? "unknown",
      ready: initial?.ready ?? false,
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      indexing: {
        documentsDiscovered: 0,
        documentsIndexed: 0,
        chunksTotal: 0,
        chunksEmbedded: 0,
        reindexing: false,
        lastReindex: null,
      },
    };
  }

  /** Record the concrete transport selected at runtime. */
  public markTransport(t: string): void {
    this.data.transport = t;
  }

  public setReindexing(active: boolean): void {
    this.data.indexing.reindexing = active;
  }

  public incEmbedded(count = 1): void {
    this.data.indexing.chunksEmbedded += count;
  }

  public setTotals(documentsDiscovered: number, documentsIndexed: number, chunksTotal: number): void {
    this.data.indexing.documentsDiscovered = documentsDiscovered;
    this.data.indexing.documentsIndexed = documentsIndexed;
    this.data.indexing.chunksTotal = chunksTotal;
  }

  public recordReindex(last: LastReindex): void {
    this.data.indexing.lastReindex = last;
  }

  /** Mark the startup index pass as complete. */
  public markReady(): void {
    this.data.ready = true;
  }

  public getStatus(): ServerStatus {
    return structuredClone(this.data);
  }
}
