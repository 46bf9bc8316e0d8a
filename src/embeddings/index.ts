import path from "node:path";
import type { Config } from "../config";
import type { Logger } from "../logger";
import { configureTransformersCache } from "./cache";
import { LocalEmbedder } from "./local";
import { RemoteEmbedder } from "./remote";
import type { Embedder } from "./types";

export { cosine } from "./types";
export type { EmbedOptions, Embedder } from "./types";
export { LocalEmbedder, DEFAULT_LOCAL_MODEL } from "./local";
export { RemoteEmbedder, DEFAULT_REMOTE_MODEL, classifyError } from "./remote";

/**
 * Pick the embedding backend once, from configuration. The returned embedder
 * still needs `init()`.
 */
export async function createEmbedder(config: Config, logger?: Logger): Promise<Embedder> {
  if (config.EMBEDDING_BACKEND === "remote") {
    return new RemoteEmbedder({
      apiKey: config.OPENAI_API_KEY,
      modelName: config.EMBEDDING_MODEL,
      logger,
    });
  }
  await configureTransformersCache(
    process.env.TRANSFORMERS_CACHE?.trim() || path.join(config.CACHE_DIR, "transformers"),
    logger,
  );
  return new LocalEmbedder({ modelName: config.EMBEDDING_MODEL, logger });
}
