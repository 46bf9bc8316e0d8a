import { pipeline, type FeatureExtractionPipeline } from "@huggingface/transformers";
import { EmbedderNotInitializedError, InputRejectedError } from "../errors";
import { getLogger, type Logger } from "../logger";
import type { EmbedOptions, Embedder } from "./types";

export const DEFAULT_LOCAL_MODEL = "Xenova/all-MiniLM-L6-v2";

export interface LocalEmbedderOptions {
  modelName?: string;
  /** Override the tokenizer's own maximum sequence length. */
  maxTokens?: number;
  logger?: Logger;
}

/**
 * In-process embedder backed by a transformers.js feature-extraction pipeline
 * (mean pooling + L2 normalisation). Deterministic and offline once the model
 * is in the local cache (see `configureTransformersCache`).
 */
export class LocalEmbedder implements Embedder {
  private readonly modelName: string;
  private readonly maxTokensOverride?: number;
  private readonly logger: Logger;
  private extractor: FeatureExtractionPipeline | null = null;
  private dim = 0;

  public constructor(options: LocalEmbedderOptions = {}) {
    this.modelName = options.modelName?.trim() || DEFAULT_LOCAL_MODEL;
    this.maxTokensOverride = options.maxTokens;
    this.logger = (options.logger ?? getLogger()).child({ module: "local-embedder" });
  }

  public get id(): string {
    return `local:${this.modelName}`;
  }

  public get dimension(): number {
    if (!this.extractor) throw new EmbedderNotInitializedError();
    return this.dim;
  }

  /** Lazily initialize the underlying embedding pipeline (idempotent). */
  public async init(): Promise<void> {
    if (this.extractor) return;
    this.logger.info({ model: this.modelName }, "loading embedding model");
    const extractor: FeatureExtractionPipeline = await pipeline("feature-extraction", this.modelName, {
      dtype: "fp32",
    });
    this.extractor = extractor;
    this.dim = (await this.run(extractor, "dimension probe")).length;
    this.logger.info({ model: this.modelName, dimension: this.dim }, "embedding model ready");
  }

  /**
   * @throws {EmbedderNotInitializedError} If {@link init} has not been called.
   * @throws {InputRejectedError} For empty text or text longer than the model's sequence limit.
   */
  public async embed(text: string): Promise<Float32Array> {
    if (!this.extractor) throw new EmbedderNotInitializedError();
    this.assertAcceptable(this.extractor, text);
    return this.run(this.extractor, text);
  }

  /**
   * Sequential on purpose: batched inference pads inputs, which can shift the
   * pooled values slightly and break equivalence with {@link embed}.
   */
  public async embedBatch(
    texts: readonly string[],
    options?: EmbedOptions,
  ): Promise<Float32Array[]> {
    const out: Float32Array[] = [];
    for (const text of texts) {
      options?.signal?.throwIfAborted();
      out.push(await this.embed(text));
    }
    return out;
  }

  private assertAcceptable(extractor: FeatureExtractionPipeline, text: string): void {
    if (!text.trim()) throw new InputRejectedError("Cannot embed empty text");
    const limit = this.maxTokensOverride ?? extractor.tokenizer.model_max_length;
    if (typeof limit !== "number" || !Number.isFinite(limit)) return;
    const tokens = extractor.tokenizer.encode(text).length;
    if (tokens > limit) {
      throw new InputRejectedError(
        `Text is ${tokens} tokens; ${this.modelName} accepts at most ${limit}. Reduce CHUNK_SIZE.`,
      );
    }
  }

  private async run(extractor: FeatureExtractionPipeline, text: string): Promise<Float32Array> {
    const output = await extractor(text, { pooling: "mean", normalize: true });
    const data: unknown = output.data;
    if (!(data instanceof Float32Array)) {
      throw new TypeError(`Unexpected embedding output from ${this.modelName}`);
    }
    return new Float32Array(data);
  }
}
