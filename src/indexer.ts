import path from "node:path";
import fg from "fast-glob";
import type { Chunker } from "./chunker";
import type { Embedder } from "./embeddings/types";
import { ReindexInProgressError, errorMessage } from "./errors";
import type { TextExtractor } from "./extractor";
import type { RwLock } from "./lock";
import { getLogger, type Logger } from "./logger";
import { isRecord, readJsonFile, writeJsonFile } from "./persistence";
import type { StatusTracker } from "./status";
import { assertDimension, type VectorIndex } from "./store/types";
import { toRecord, type CourseDocument } from "./types";

/** Per-document lifecycle within one reindex pass. */
export type DocumentState = "unseen" | "chunked" | "embedded" | "indexed" | "failed";

export type ReindexMode = "incremental" | "full";

export interface ReindexReport {
  mode: ReindexMode;
  /** Documents found on disk. */
  scanned: number;
  /** Documents (re)chunked, embedded and written. */
  indexed: string[];
  /** Documents whose cached mtime still matched. */
  skipped: string[];
  /** Documents no longer on disk whose records were deleted. */
  removed: string[];
  /** Documents whose update was aborted; their previous records are untouched. */
  failed: { documentId: string; error: string }[];
  chunksEmbedded: number;
  durationMs: number;
}

interface ManifestEntry {
  mtimeMs: number;
  chunkCount: number;
  indexedAt: string;
}

/** mtime-tracking record persisted next to the index artifact. */
interface Manifest {
  version: number;
  embedder: string;
  chunkSize: number;
  chunkOverlap: number;
  documents: Record<string, ManifestEntry>;
}

const MANIFEST_VERSION = 1;

/**
 * Options required to construct an {@link IndexManager}. `manifestPath` may be
 * omitted for a purely in-memory setup.
 */
export interface IndexManagerOptions {
  /** Corpus root directory. */
  root: string;
  /** File extensions WITHOUT leading dot. */
  allowedExt: string[];
  /** Folder names skipped during discovery. */
  excludedFolders?: string[];
  chunker: Chunker;
  embedder: Embedder;
  index: VectorIndex;
  lock: RwLock;
  extractor: TextExtractor;
  manifestPath?: string;
  status?: StatusTracker;
  logger?: Logger;
}

/**
 * Reconciles the corpus folder with the vector index.
 *
 * Unchanged documents (same mtime as recorded in the manifest) are skipped, so
 * a restart costs no embedding calls. A changed document is extracted, chunked
 * and embedded in full before its old records are replaced; the replacement
 * happens under the exclusive side of the shared lock, so
 * concurrent queries see either the old or the new chunks, never a mix.
 */
export class IndexManager {
  private readonly root: string;
  private readonly allowedExt: string[];
  private readonly excludedFolders: string[];
  private readonly chunker: Chunker;
  private readonly embedder: Embedder;
  private readonly index: VectorIndex;
  private readonly lock: RwLock;
  private readonly extractor: TextExtractor;
  private readonly manifestPath?: string;
  private readonly status?: StatusTracker;
  private readonly logger: Logger;
  private readonly states = new Map<string, DocumentState>();
  private manifest: Manifest;
  private running = false;

  public constructor(opts: IndexManagerOptions) {
    this.root = opts.root;
    this.allowedExt = opts.allowedExt;
    this.excludedFolders = opts.excludedFolders ?? [];
    this.chunker = opts.chunker;
    this.embedder = opts.embedder;
    this.index = opts.index;
    this.lock = opts.lock;
    this.extractor = opts.extractor;
    this.manifestPath = opts.manifestPath;
    this.status = opts.status;
    this.logger = (opts.logger ?? getLogger()).child({ module: "index-manager" });
    this.manifest = this.emptyManifest();
  }

  /** Whether a reindex pass is currently running. */
  public isBusy(): boolean {
    return this.running;
  }

  public getDocumentState(documentId: string): DocumentState {
    return this.states.get(documentId) ?? "unseen";
  }

  /** Document ids with records in the index, per the manifest. */
  public trackedDocuments(): string[] {
    return Object.keys(this.manifest.documents).sort();
  }

  /** Last-indexed mtime recorded for a document, if any. */
  public indexedMtime(documentId: string): number | undefined {
    return this.manifest.documents[documentId]?.mtimeMs;
  }

  /**
   * Hydrate the manifest from disk. A missing or unreadable manifest starts
   * empty, which makes the next pass treat every document as new.
   */
  public async loadManifest(): Promise<void> {
    this.manifest = this.emptyManifest();
    if (!this.manifestPath) return;
    try {
      const parsed = await readJsonFile(this.manifestPath);
      if (parsed === undefined) return;
      const manifest = parseManifest(parsed);
      if (!manifest) {
        this.logger.warn({ manifestPath: this.manifestPath }, "manifest malformed; ignoring it");
        return;
      }
      this.manifest = manifest;
      this.logger.info(
        { manifestPath: this.manifestPath, documents: Object.keys(manifest.documents).length },
        "loaded manifest",
      );
    } catch (err) {
      this.logger.warn({ err, manifestPath: this.manifestPath }, "manifest unreadable; ignoring it");
    }
  }

  /** mtime-driven pass: only new or changed documents are re-embedded. */
  public async reindexIncremental(): Promise<ReindexReport> {
    return this.exclusive("incremental");
  }

  /** Rebuild every document regardless of cached mtimes. */
  public async reindexAll(): Promise<ReindexReport> {
    return this.exclusive("full");
  }

  private async exclusive(mode: ReindexMode): Promise<ReindexReport> {
    if (this.running) throw new ReindexInProgressError();
    this.running = true;
    this.status?.setReindexing(true);
    try {
      return await this.run(mode);
    } finally {
      this.running = false;
      this.status?.setReindexing(false);
    }
  }

  private async run(mode: ReindexMode): Promise<ReindexReport> {
    const started = Date.now();
    let full = mode === "full";
    if (!this.manifestMatchesSetup()) {
      if (!full) this.logger.info("embedder or chunk settings changed; rebuilding all documents");
      full = true;
      this.manifest = this.emptyManifest();
    }

    const docs = await this.discoverDocuments();
    const onDisk = new Set(docs.map((d) => d.id));
    this.logger.info({ mode, root: this.root, documents: docs.length }, "reindex starting");

    const report: ReindexReport = {
      mode,
      scanned: docs.length,
      indexed: [],
      skipped: [],
      removed: [],
      failed: [],
      chunksEmbedded: 0,
      durationMs: 0,
    };

    // Documents gone from disk: known to the manifest, or still referenced by
    // records (e.g. left behind by a lost manifest).
    const stored = new Set(await this.index.documentIds());
    const known = new Set([...Object.keys(this.manifest.documents), ...stored]);
    for (const documentId of [...known].sort()) {
      if (onDisk.has(documentId)) continue;
      const count = await this.lock.write(() => this.index.deleteByDocument(documentId));
      delete this.manifest.documents[documentId];
      this.states.delete(documentId);
      report.removed.push(documentId);
      this.logger.info({ documentId, chunks: count }, "removed deleted document");
    }

    for (const doc of docs) {
      const entry = this.manifest.documents[doc.id];
      // An entry whose records are gone (lost artifact) does not count as indexed.
      const unchanged =
        entry !== undefined &&
        entry.mtimeMs === doc.mtimeMs &&
        (entry.chunkCount === 0 || stored.has(doc.id));
      if (!full && unchanged) {
        this.states.set(doc.id, "indexed");
        report.skipped.push(doc.id);
        continue;
      }
      try {
        const chunks = await this.indexDocument(doc);
        report.indexed.push(doc.id);
        report.chunksEmbedded += chunks;
      } catch (err) {
        this.states.set(doc.id, "failed");
        report.failed.push({ documentId: doc.id, error: errorMessage(err) });
        this.logger.error({ err, documentId: doc.id }, "failed to index document; skipping it");
      }
    }

    await this.index.persist();
    await this.saveManifest();

    report.durationMs = Date.now() - started;
    this.status?.setTotals(
      docs.length,
      Object.keys(this.manifest.documents).length,
      await this.index.size(),
    );
    this.status?.recordReindex({
      mode,
      finishedAt: new Date().toISOString(),
      indexed: report.indexed.length,
      skipped: report.skipped.length,
      removed: report.removed.length,
      failed: report.failed.length,
      durationMs: report.durationMs,
    });
    this.logger.info(
      {
        mode,
        indexed: report.indexed.length,
        skipped: report.skipped.length,
        removed: report.removed.length,
        failed: report.failed.length,
        chunksEmbedded: report.chunksEmbedded,
        durationMs: report.durationMs,
      },
      "reindex complete",
    );
    return report;
  }

  /**
   * Extract, chunk and embed one document, then swap its records. Any failure
   * before the swap leaves the previously indexed records in place.
   *
   * @returns Number of chunks embedded.
   */
  private async indexDocument(doc: CourseDocument): Promise<number> {
    const text = await this.extractor.extractText(doc.absPath);
    // Whitespace-only windows carry nothing to retrieve.
    const chunks = this.chunker.chunk(text, doc.id).filter((c) => c.text.trim().length > 0);
    this.states.set(doc.id, "chunked");

    const vectors = await this.embedder.embedBatch(chunks.map((c) => c.text));
    this.states.set(doc.id, "embedded");
    const records = chunks.map((c, i) => toRecord(c, vectors[i]));
    for (const r of records) assertDimension(r.vector, this.index.dimension, `Record ${r.id}`);

    await this.lock.write(() => this.index.replaceDocument(doc.id, records));
    this.manifest.documents[doc.id] = {
      mtimeMs: doc.mtimeMs,
      chunkCount: records.length,
      indexedAt: new Date().toISOString(),
    };
    this.states.set(doc.id, "indexed");
    this.status?.incEmbedded(records.length);
    this.logger.debug({ documentId: doc.id, chunks: records.length }, "indexed document");
    return records.length;
  }

  private async discoverDocuments(): Promise<CourseDocument[]> {
    const patterns = this.allowedExt.map((ext) => `**/*.${ext}`);
    // Stats come from the walk itself; a file that vanishes mid-walk is dropped
    // by fast-glob instead of failing the pass.
    const entries = await fg(patterns, {
      cwd: this.root,
      absolute: true,
      dot: false,
      onlyFiles: true,
      stats: true,
      caseSensitiveMatch: false,
      ignore: this.excludedFolders.map((f) => `**/${f}/**`),
    });
    const docs: CourseDocument[] = [];
    for (const entry of entries) {
      if (!entry.stats) continue;
      const id = path.relative(this.root, entry.path).split(path.sep).join("/");
      docs.push({ id, absPath: entry.path, mtimeMs: entry.stats.mtimeMs });
    }
    return docs.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  }

  private manifestMatchesSetup(): boolean {
    return (
      this.manifest.embedder === this.embedder.id &&
      this.manifest.chunkSize === this.chunker.chunkSize &&
      this.manifest.chunkOverlap === this.chunker.chunkOverlap
    );
  }

  private emptyManifest(): Manifest {
    return {
      version: MANIFEST_VERSION,
      embedder: this.embedder.id,
      chunkSize: this.chunker.chunkSize,
      chunkOverlap: this.chunker.chunkOverlap,
      documents: {},
    };
  }

  private async saveManifest(): Promise<void> {
    if (!this.manifestPath) return;
    await writeJsonFile(this.manifestPath, this.manifest);
  }
}

function parseManifest(value: unknown): Manifest | null {
  if (
    !isRecord(value) ||
    value.version !== MANIFEST_VERSION ||
    typeof value.embedder !== "string" ||
    typeof value.chunkSize !== "number" ||
    typeof value.chunkOverlap !== "number" ||
    !isRecord(value.documents)
  ) {
    return null;
  }
  const documents: Record<string, ManifestEntry> = {};
  for (const [id, entry] of Object.entries(value.documents)) {
    if (
      !isRecord(entry) ||
      typeof entry.mtimeMs !== "number" ||
      typeof entry.chunkCount !== "number" ||
      typeof entry.indexedAt !== "string"
    ) {
      return null;
    }
    documents[id] = {
      mtimeMs: entry.mtimeMs,
      chunkCount: entry.chunkCount,
      indexedAt: entry.indexedAt,
    };
  }
  return {
    version: MANIFEST_VERSION,
    embedder: value.embedder,
    chunkSize: value.chunkSize,
    chunkOverlap: value.chunkOverlap,
    documents,
  };
}
