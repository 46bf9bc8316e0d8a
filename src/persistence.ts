import fs, { type FileHandle } from "node:fs/promises";
import path from "node:path";

/**
 * Small JSON persistence helpers shared by the local vector index and the
 * index manifest.
 *
 * Every file handle is opened inside {@link withFile} so it is closed on all
 * exit paths. Writes go to a sibling temp file that is renamed over the target,
 * so a crash mid-write never leaves a truncated artifact behind.
 */

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

/** Open `filePath`, run `fn`, and always close the handle. */
export async function withFile<T>(
  filePath: string,
  flags: string,
  fn: (handle: FileHandle) => Promise<T>,
): Promise<T> {
  const handle = await fs.open(filePath, flags);
  try {
    return await fn(handle);
  } finally {
    await handle.close();
  }
}

/**
 * Read and parse a JSON file.
 *
 * @returns `undefined` when the file does not exist.
 * @throws {SyntaxError} when the content is not valid JSON.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await withFile(filePath, "r", (handle) => handle.readFile("utf8"));
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return undefined;
    throw err;
  }
  return JSON.parse(raw);
}

/** Atomically replace `filePath` with the JSON serialisation of `value`. */
export async function writeJsonFile(filePath: string, value: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tmp = `${filePath}.${process.pid}.tmp`;
  try {
    await withFile(tmp, "w", async (handle) => {
      await handle.writeFile(JSON.stringify(value), "utf8");
      await handle.sync();
    });
    await fs.rename(tmp, filePath);
  } catch (err) {
    await fs.rm(tmp, { force: true });
    throw err;
  }
}

/** Encode a vector as base64 little-endian float32. */
export function encodeVector(vector: Float32Array): string {
  return Buffer.from(vector.buffer, vector.byteOffset, vector.byteLength).toString("base64");
}

/** Decode {@link encodeVector} output; `null` if the payload is not whole floats. */
export function decodeVector(encoded: string): Float32Array | null {
  const buf = Buffer.from(encoded, "base64");
  if (buf.byteLength === 0 || buf.byteLength % 4 !== 0) return null;
  // Copy: Buffer pools are not guaranteed 4-byte aligned.
  const copy = new Uint8Array(buf);
  return new Float32Array(copy.buffer, 0, copy.byteLength / 4);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
