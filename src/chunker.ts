import { ConfigError } from "./errors";
import type { Chunk } from "./types";

/**
 * Validate chunk sizing. Called once at startup; an overlap that is not
 * strictly smaller than the window would never make forward progress.
 *
 * @throws {ConfigError}
 */
export function assertChunkParams(maxLen: number, overlap: number): void {
  if (!Number.isInteger(maxLen) || maxLen < 1) {
    throw new ConfigError(`chunk size must be a positive integer (got ${maxLen})`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ConfigError(`chunk overlap must be a non-negative integer (got ${overlap})`);
  }
  if (overlap >= maxLen) {
    throw new ConfigError(
      `chunk overlap (${overlap}) must be strictly less than chunk size (${maxLen})`,
    );
  }
}

/**
 * Split text into fixed-size overlapping windows.
 *
 * Window i+1 starts `overlap` characters before the end of window i. Splitting
 * stops as soon as a window reaches the end of the text, so the tail is
 * absorbed into the final chunk rather than emitted as a tiny fragment. Only
 * the final chunk may be shorter than `maxLen`.
 *
 * Parameters are assumed valid (see {@link assertChunkParams}).
 */
export function chunkText(
  text: string,
  maxLen: number,
  overlap: number,
  documentId = "",
): Chunk[] {
  const out: Chunk[] = [];
  if (text.length === 0) return out;

  let start = 0;
  for (let index = 0; ; index++) {
    const end = Math.min(start + maxLen, text.length);
    out.push({ documentId, index, text: text.slice(start, end), start, end });
    if (end === text.length) break;
    start = end - overlap;
  }
  return out;
}

/** Chunker bound to one validated configuration. */
export class Chunker {
  public constructor(
    public readonly chunkSize: number,
    public readonly chunkOverlap: number,
  ) {
    assertChunkParams(chunkSize, chunkOverlap);
  }

  public chunk(text: string, documentId: string): Chunk[] {
    return chunkText(text, this.chunkSize, this.chunkOverlap, documentId);
  }
}
