/**
 * Model cache location for the local embedder. Must run before the first
 * pipeline is created; transformers.js reads `env.cacheDir` at download time.
 */
import fs from "node:fs/promises";
import path from "node:path";
import { env } from "@huggingface/transformers";
import { getLogger, type Logger } from "../logger";

/**
 * Point transformers.js at an on-disk model cache, creating it if needed.
 *
 * @param cacheDir Explicit directory; falls back to TRANSFORMERS_CACHE, then
 *                 `.cache/transformers` under the working directory.
 * @returns The directory in use.
 */
export async function configureTransformersCache(
  cacheDir?: string,
  logger: Logger = getLogger(),
): Promise<string> {
  const dir =
    cacheDir?.trim() ||
    process.env.TRANSFORMERS_CACHE?.trim() ||
    path.resolve(process.cwd(), ".cache/transformers");
  await fs.mkdir(dir, { recursive: true });
  env.useBrowserCache = false;
  env.cacheDir = dir;
  env.allowLocalModels = true;
  logger.info({ cacheDir: dir }, "model cache configured");
  return dir;
}
