import path from "node:path";
import type { Config } from "../config";
import type { Embedder } from "../embeddings/types";
import { ConfigError } from "../errors";
import type { Logger } from "../logger";
import { LocalVectorIndex } from "./local";
import { SupabaseVectorIndex } from "./supabase";
import type { VectorIndex } from "./types";

export type { VectorIndex } from "./types";
export { LocalVectorIndex } from "./local";
export { SupabaseVectorIndex } from "./supabase";

/** Local index artifact location under the cache directory. */
export function indexStorePath(config: Config): string {
  return path.join(config.CACHE_DIR, "index.json");
}

/**
 * Pick the storage backend once, from configuration. The embedder must be
 * initialised so its dimension is known.
 */
export function createVectorIndex(config: Config, embedder: Embedder, logger?: Logger): VectorIndex {
  const common = { embedderId: embedder.id, dimension: embedder.dimension, logger };
  if (config.STORAGE_BACKEND === "remote") {
    if (!config.SUPABASE) throw new ConfigError("Supabase settings missing for remote storage");
    return new SupabaseVectorIndex(config.SUPABASE, common);
  }
  return new LocalVectorIndex({ ...common, storePath: indexStorePath(config) });
}
