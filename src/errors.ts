/**
 * Error taxonomy shared by the retrieval core and its transports.
 *
 * Every error carries a stable `code` (used by transports to pick a status /
 * MCP error code) and a `retryable` flag so callers can tell a transient
 * backend outage apart from a request that will never succeed.
 */
export class CourseRagError extends Error {
  public readonly code: string;
  public readonly retryable: boolean;

  public constructor(
    message: string,
    code: string,
    options?: { retryable?: boolean; cause?: unknown },
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "CourseRagError";
    this.code = code;
    this.retryable = options?.retryable ?? false;
  }
}

/** Invalid or incomplete configuration. Fatal at startup. */
export class ConfigError extends CourseRagError {
  public constructor(message: string) {
    super(message, "config");
    this.name = "ConfigError";
  }
}

/** A remote embedding / storage backend could not serve the request. */
export class BackendUnavailableError extends CourseRagError {
  public constructor(
    message: string,
    options?: { retryable?: boolean; cause?: unknown; code?: "backend_unavailable" | "timeout" },
  ) {
    super(message, options?.code ?? "backend_unavailable", {
      retryable: options?.retryable ?? true,
      cause: options?.cause,
    });
    this.name = "BackendUnavailableError";
  }
}

/** The request itself is unacceptable (empty query, oversized chunk, ...). */
export class InputRejectedError extends CourseRagError {
  public constructor(message: string, cause?: unknown) {
    super(message, "input_rejected", { cause });
    this.name = "InputRejectedError";
  }
}

/** Persisted index artifact is unreadable or was written by an incompatible setup. */
export class IndexCorruptError extends CourseRagError {
  public constructor(message: string, cause?: unknown) {
    super(message, "index_corrupt", { cause });
    this.name = "IndexCorruptError";
  }
}

/** A reindex pass is already running. */
export class ReindexInProgressError extends CourseRagError {
  public constructor() {
    super("A reindex is already in progress", "reindex_in_progress", { retryable: true });
    this.name = "ReindexInProgressError";
  }
}

/** Error thrown when attempting to embed before initialization. */
export class EmbedderNotInitializedError extends CourseRagError {
  public constructor() {
    super("Embedder not initialized. Call init() first.", "embedder_not_initialized");
    this.name = "EmbedderNotInitializedError";
  }
}

export class UnsupportedFormatError extends CourseRagError {
  public constructor(filePath: string) {
    super(`Unsupported document format: ${filePath}`, "unsupported_format");
    this.name = "UnsupportedFormatError";
  }
}

export class CorruptFileError extends CourseRagError {
  public constructor(filePath: string, cause?: unknown) {
    super(`Could not extract text from ${filePath}`, "corrupt_file", { cause });
    this.name = "CorruptFileError";
  }
}

/** Raised by {@link AnswerGenerator} implementations. */
export class GenerationBackendError extends CourseRagError {
  public constructor(message: string, cause?: unknown) {
    super(message, "generation_backend", { retryable: true, cause });
    this.name = "GenerationBackendError";
  }
}

/** Best-effort human readable message for logging unknown thrown values. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
