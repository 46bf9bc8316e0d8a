import OpenAI, { APIConnectionError, APIError, APIUserAbortError } from "openai";
import pRetry, { AbortError, type FailedAttemptError } from "p-retry";
import { get_encoding, type Tiktoken } from "tiktoken";
import { BackendUnavailableError, InputRejectedError, errorMessage } from "../errors";
import { getLogger, type Logger } from "../logger";
import type { EmbedOptions, Embedder } from "./types";

export const DEFAULT_REMOTE_MODEL = "text-embedding-3-small";

/** Output dimension of the OpenAI embedding models we know about. */
const KNOWN_DIMENSIONS: Record<string, number> = {
  "text-embedding-3-small": 1536,
  "text-embedding-3-large": 3072,
  "text-embedding-ada-002": 1536,
};

/** Input limit shared by the OpenAI embedding models. */
const MAX_INPUT_TOKENS = 8191;

export interface RetryPolicy {
  /** Total attempts including the first (default 3). */
  attempts: number;
  /** Delay before the first retry; doubles on each further retry (default 1000). */
  minTimeoutMs: number;
  factor: number;
}

export interface RemoteEmbedderOptions {
  apiKey?: string;
  modelName?: string;
  /** Pre-built client; mostly for tests. The client's own retries should be disabled. */
  client?: OpenAI;
  /** Max inputs per API request (default 100). */
  batchSize?: number;
  /** Per-request timeout handed to the SDK (default 30s). */
  requestTimeoutMs?: number;
  retry?: Partial<RetryPolicy>;
  logger?: Logger;
}

const DEFAULT_RETRY: RetryPolicy = { attempts: 3, minTimeoutMs: 1_000, factor: 2 };

/**
 * Embedder backed by the OpenAI embeddings API.
 *
 * Transient failures (rate limits, timeouts, 5xx, connection errors) are
 * retried with exponential backoff; anything else surfaces on the first
 * attempt. The SDK's built-in retries are switched off so this class owns
 * the policy.
 */
export class RemoteEmbedder implements Embedder {
  private readonly client: OpenAI;
  private readonly modelName: string;
  private readonly batchSize: number;
  private readonly requestTimeoutMs: number;
  private readonly retry: RetryPolicy;
  private readonly logger: Logger;
  private encoder: Tiktoken | null = null;
  private dim: number;

  public constructor(options: RemoteEmbedderOptions) {
    this.modelName = options.modelName?.trim() || DEFAULT_REMOTE_MODEL;
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey, maxRetries: 0 });
    this.batchSize = Math.max(1, options.batchSize ?? 100);
    this.requestTimeoutMs = options.requestTimeoutMs ?? 30_000;
    this.retry = { ...DEFAULT_RETRY, ...options.retry };
    this.logger = (options.logger ?? getLogger()).child({ module: "remote-embedder" });
    this.dim = KNOWN_DIMENSIONS[this.modelName] ?? 0;
  }

  public get id(): string {
    return `remote:${this.modelName}`;
  }

  public get dimension(): number {
    return this.dim;
  }

  /** Resolves the vector length; unknown models are probed with one request. */
  public async init(): Promise<void> {
    if (this.dim > 0) return;
    const [probe] = await this.embedBatch(["dimension probe"]);
    this.dim = probe.length;
    this.logger.info({ model: this.modelName, dimension: this.dim }, "embedding model probed");
  }

  public async embed(text: string, options?: EmbedOptions): Promise<Float32Array> {
    const [vector] = await this.embedBatch([text], options);
    return vector;
  }

  public async embedBatch(
    texts: readonly string[],
    options?: EmbedOptions,
  ): Promise<Float32Array[]> {
    if (texts.length === 0) return [];
    texts.forEach((text) => this.assertAcceptable(text));

    const out: Float32Array[] = [];
    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      out.push(...(await this.requestWithRetry(batch, options?.signal)));
    }
    return out;
  }

  private assertAcceptable(text: string): void {
    if (!text.trim()) throw new InputRejectedError("Cannot embed empty text");
    this.encoder ??= get_encoding("cl100k_base");
    // Special-token markers are counted as plain text.
    const tokens = this.encoder.encode(text, [], []).length;
    if (tokens > MAX_INPUT_TOKENS) {
      throw new InputRejectedError(
        `Text is ${tokens} tokens; ${this.modelName} accepts at most ${MAX_INPUT_TOKENS}.`,
      );
    }
  }

  private async requestWithRetry(
    batch: readonly string[],
    signal?: AbortSignal,
  ): Promise<Float32Array[]> {
    const { attempts, minTimeoutMs, factor } = this.retry;
    try {
      return await pRetry(() => this.request(batch, signal), {
        retries: Math.max(0, attempts - 1),
        minTimeout: minTimeoutMs,
        factor,
        randomize: false,
        signal,
        onFailedAttempt: (error: FailedAttemptError) => {
          this.logger.warn(
            {
              attemptNumber: error.attemptNumber,
              retriesLeft: error.retriesLeft,
              error: error.message,
            },
            "embedding request failed",
          );
        },
      });
    } catch (err) {
      if (err instanceof BackendUnavailableError && err.retryable) {
        throw new BackendUnavailableError(
          `Embedding backend unavailable after ${attempts} attempts: ${err.message}`,
          { cause: err },
        );
      }
      throw err;
    }
  }

  private async request(batch: readonly string[], signal?: AbortSignal): Promise<Float32Array[]> {
    try {
      const response = await this.client.embeddings.create(
        { model: this.modelName, input: [...batch], encoding_format: "float" },
        { timeout: this.requestTimeoutMs, signal },
      );
      const rows = [...response.data].sort((a, b) => a.index - b.index);
      if (rows.length !== batch.length) {
        throw new BackendUnavailableError(
          `Embedding backend returned ${rows.length} vectors for ${batch.length} inputs`,
          { retryable: false },
        );
      }
      return rows.map((row) => Float32Array.from(row.embedding));
    } catch (err) {
      const mapped = classifyError(err);
      // AbortError stops p-retry and rejects with the wrapped error.
      throw mapped.retryable ? mapped : new AbortError(mapped);
    }
  }
}

/**
 * Map an SDK failure onto the error taxonomy. Only the retryable ones are
 * worth another attempt.
 */
export function classifyError(err: unknown): BackendUnavailableError | InputRejectedError {
  if (err instanceof BackendUnavailableError || err instanceof InputRejectedError) return err;
  if (err instanceof APIUserAbortError) {
    return new BackendUnavailableError("Embedding request aborted", {
      retryable: false,
      code: "timeout",
      cause: err,
    });
  }
  // Includes APIConnectionTimeoutError.
  if (err instanceof APIConnectionError) {
    return new BackendUnavailableError(`Embedding backend unreachable: ${err.message}`, {
      cause: err,
    });
  }
  if (err instanceof APIError) {
    const status = err.status ?? 0;
    if (status === 408 || status === 409 || status === 429 || status >= 500) {
      return new BackendUnavailableError(`Embedding backend error ${status}: ${err.message}`, {
        cause: err,
      });
    }
    if (status === 401 || status === 403) {
      return new BackendUnavailableError(`Embedding backend rejected credentials: ${err.message}`, {
        retryable: false,
        cause: err,
      });
    }
    return new InputRejectedError(`Embedding backend rejected input: ${err.message}`, err);
  }
  return new BackendUnavailableError(`Embedding request failed: ${errorMessage(err)}`, {
    retryable: false,
    cause: err,
  });
}
