export interface EmbedOptions {
  /** Abort an in-flight embedding request (e.g. query timeout). */
  signal?: AbortSignal;
}

/**
 * Maps text to fixed-length vectors. `embedBatch(texts)` must produce the same
 * values, in the same order, as `texts.map(embed)`; it only exists for
 * throughput.
 *
 * Implementations never truncate input: text longer than the backend accepts
 * is rejected with an `InputRejectedError`.
 */
export interface Embedder {
  /** Stable identity (`backend:model`) recorded alongside persisted vectors. */
  readonly id: string;
  /** Vector length. Only valid after {@link init} resolved. */
  readonly dimension: number;
  init(): Promise<void>;
  embed(text: string, options?: EmbedOptions): Promise<Float32Array>;
  embedBatch(texts: readonly string[], options?: EmbedOptions): Promise<Float32Array[]>;
}

/**
 * Cosine similarity between two vectors of equal length. Zero vectors score 0.
 */
export function cosine(a: Float32Array, b: Float32Array): number {
  let dot = 0,
    na = 0,
    nb = 0;
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const x = a[i],
      y = b[i];
    dot += x * y;
    na += x * x;
    nb += y * y;
  }
  return dot / (Math.sqrt(na) * Math.sqrt(nb) + 1e-10);
}
