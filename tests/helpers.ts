import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import pino from "pino";
import type { EmbedOptions, Embedder } from "../src/embeddings/types";
import { InputRejectedError } from "../src/errors";

export const silentLogger = pino({ level: "silent" });

export const VOCABULARY = [
  "csce",
  "629",
  "221",
  "222",
  "requires",
  "and",
  "prerequisites",
  "for",
] as const;

export interface FakeEmbedderOptions {
  id?: string;
  /** Throw when embedding a text that contains this substring. */
  failOn?: string;
  /** Delay every call; aborts early when the signal fires. */
  delayMs?: number;
}

/**
 * Deterministic bag-of-words embedder: component i counts occurrences of
 * VOCABULARY[i] among the lowercased alphanumeric tokens.
 */
export class FakeEmbedder implements Embedder {
  public readonly id: string;
  public readonly dimension = VOCABULARY.length;
  public embedCalls = 0;
  public embeddedTexts: string[] = [];
  private readonly failOn?: string;
  private readonly delayMs: number;

  public constructor(options: FakeEmbedderOptions = {}) {
    this.id = options.id ?? "fake:bag-of-words";
    this.failOn = options.failOn;
    this.delayMs = options.delayMs ?? 0;
  }

  public async init(): Promise<void> {}

  public async embed(text: string, options?: EmbedOptions): Promise<Float32Array> {
    this.embedCalls++;
    this.embeddedTexts.push(text);
    if (this.delayMs > 0) await sleep(this.delayMs, options?.signal);
    if (this.failOn && text.includes(this.failOn)) {
      throw new InputRejectedError(`refusing to embed "${this.failOn}"`);
    }
    return vectorize(text);
  }

  public async embedBatch(
    texts: readonly string[],
    options?: EmbedOptions,
  ): Promise<Float32Array[]> {
    const out: Float32Array[] = [];
    for (const t of texts) out.push(await this.embed(t, options));
    return out;
  }
}

export function vectorize(text: string): Float32Array {
  const tokens = text.toLowerCase().split(/[^a-z0-9]+/).filter(Boolean);
  const v = new Float32Array(VOCABULARY.length);
  VOCABULARY.forEach((word, i) => {
    v[i] = tokens.filter((t) => t === word).length;
  });
  return v;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener("abort", () => {
      clearTimeout(timer);
      reject(new Error("aborted"));
    });
  });
}

export async function makeTempDir(prefix = "course-rag-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function writeDoc(
  root: string,
  rel: string,
  text: string,
  mtimeSec?: number,
): Promise<string> {
  const abs = path.join(root, rel);
  await fs.mkdir(path.dirname(abs), { recursive: true });
  await fs.writeFile(abs, text, "utf8");
  if (mtimeSec !== undefined) await fs.utimes(abs, mtimeSec, mtimeSec);
  return abs;
}

/** Build a unit vector of `dimension` with a 1 at `hot`. */
export function oneHot(dimension: number, hot: number): Float32Array {
  const v = new Float32Array(dimension);
  v[hot] = 1;
  return v;
}
