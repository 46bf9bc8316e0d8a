import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { assertChunkParams } from "./chunker";
import { ConfigError } from "./errors";
// Import version directly from package.json (requires tsconfig "resolveJsonModule": true)
import pkg from "../package.json" with { type: "json" };

// Centralized single dotenv.config() call: project-root .env first, then cwd.
(() => {
  const here = path.dirname(fileURLToPath(import.meta.url));
  const rootEnv = path.resolve(here, "../.env");
  if (fsSync.existsSync(rootEnv)) {
    dotenv.config({ path: rootEnv });
    return;
  }
  dotenv.config();
})();

/** Application version sourced from package.json. */
export const APP_VERSION: string = pkg.version;

export type BackendKind = "local" | "remote";

export interface SupabaseSettings {
  url: string;
  serviceRoleKey: string;
  table: string;
  matchFunction: string;
}

export interface Config {
  DATA_DIR: string;
  CACHE_DIR: string;
  ALLOWED_EXT: string[];
  EXCLUDED_FOLDERS: string[];
  VERBOSE: boolean;
  LOG_LEVEL: string;
  CHUNK_SIZE: number;
  CHUNK_OVERLAP: number;
  SIMILARITY_FLOOR: number;
  MAX_RESULTS: number;
  EMBEDDING_BACKEND: BackendKind;
  EMBEDDING_MODEL: string | undefined;
  STORAGE_BACKEND: BackendKind;
  OPENAI_API_KEY: string | undefined;
  SUPABASE: SupabaseSettings | undefined;
  QUERY_TIMEOUT_MS: number;
  MCP_TRANSPORT: string;
  MCP_PORT: number;
  HOST: string;
}

type Env = Record<string, string | undefined>;

function readList(raw: string | undefined, fallback: string[]): string[] {
  const list = raw
    ?.split(",")
    .map((s) => s.trim().replace(/^\./, ""))
    .filter(Boolean);
  return list && list.length ? list : fallback;
}

function readFlag(raw: string | undefined): boolean {
  const v = (raw ?? "").trim().toLowerCase();
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

function readInt(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min) {
    throw new ConfigError(`${name} must be an integer >= ${min} (got "${raw}")`);
  }
  return n;
}

function readBackend(env: Env, name: string): BackendKind {
  const raw = (env[name] ?? "local").trim().toLowerCase();
  if (raw === "local" || raw === "remote") return raw;
  throw new ConfigError(`${name} must be "local" or "remote" (got "${raw}")`);
}

/**
 * Parse and validate a configuration from an environment map. Pure apart from
 * reading `env`; {@link getConfig} binds it to `process.env`.
 *
 * @throws {ConfigError} on any invalid or missing required value.
 */
export function parseConfig(env: Env): Config {
  const DATA_DIR = path.resolve(env.DATA_DIR?.trim() || "Database");
  const CACHE_DIR = path.resolve(env.CACHE_DIR?.trim() || "cache");

  const ALLOWED_EXT = readList(env.ALLOWED_EXT, ["txt", "md", "pdf"]).map((e) => e.toLowerCase());
  // Folder names (not globs) pruned during corpus discovery.
  const EXCLUDED_FOLDERS = readList(env.EXCLUDED_FOLDERS, ["node_modules", ".git"]);

  const VERBOSE = readFlag(env.VERBOSE);
  const LOG_LEVEL = env.LOG_LEVEL?.trim().toLowerCase() || (VERBOSE ? "debug" : "info");

  // Chunk sizing is empirically tuned per corpus; 800 / 100 is only a starting point.
  const CHUNK_SIZE = readInt(env, "CHUNK_SIZE", 800, 1);
  const CHUNK_OVERLAP = readInt(env, "CHUNK_OVERLAP", 100, 0);
  assertChunkParams(CHUNK_SIZE, CHUNK_OVERLAP);

  const SIMILARITY_FLOOR = (() => {
    const raw = (env.SIMILARITY_FLOOR ?? env.SIMILARITY_THRESHOLD)?.trim();
    if (!raw) return 0.1;
    const n = Number(raw);
    if (!Number.isFinite(n) || n < -1 || n > 1) {
      throw new ConfigError(`SIMILARITY_FLOOR must be a number in [-1, 1] (got "${raw}")`);
    }
    return n;
  })();
  const MAX_RESULTS = readInt(env, "MAX_RESULTS", 3, 1);

  const EMBEDDING_BACKEND = readBackend(env, "EMBEDDING_BACKEND");
  const EMBEDDING_MODEL = env.EMBEDDING_MODEL?.trim() || undefined;
  const OPENAI_API_KEY = env.OPENAI_API_KEY?.trim() || undefined;
  if (EMBEDDING_BACKEND === "remote" && !OPENAI_API_KEY) {
    throw new ConfigError("OPENAI_API_KEY is required when EMBEDDING_BACKEND=remote");
  }

  const STORAGE_BACKEND = readBackend(env, "STORAGE_BACKEND");
  let SUPABASE: SupabaseSettings | undefined;
  if (STORAGE_BACKEND === "remote") {
    const url = env.SUPABASE_URL?.trim();
    const serviceRoleKey = env.SUPABASE_SERVICE_ROLE_KEY?.trim();
    if (!url || !serviceRoleKey) {
      throw new ConfigError(
        "SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required when STORAGE_BACKEND=remote",
      );
    }
    SUPABASE = {
      url,
      serviceRoleKey,
      table: env.SUPABASE_TABLE?.trim() || "course_chunks",
      matchFunction: env.SUPABASE_MATCH_FUNCTION?.trim() || "match_course_chunks",
    };
  }

  const QUERY_TIMEOUT_MS = readInt(env, "QUERY_TIMEOUT_MS", 10_000, 1);

  // Transport mode: 'stdio' (default) or 'http'/'streamable-http'.
  const MCP_TRANSPORT = (env.MCP_TRANSPORT ?? "").trim().toLowerCase();
  const MCP_PORT = readInt(env, "MCP_PORT", 3000, 1);
  const HOST = env.HOST?.trim() || "127.0.0.1";

  return {
    DATA_DIR,
    CACHE_DIR,
    ALLOWED_EXT,
    EXCLUDED_FOLDERS,
    VERBOSE,
    LOG_LEVEL,
    CHUNK_SIZE,
    CHUNK_OVERLAP,
    SIMILARITY_FLOOR,
    MAX_RESULTS,
    EMBEDDING_BACKEND,
    EMBEDDING_MODEL,
    STORAGE_BACKEND,
    OPENAI_API_KEY,
    SUPABASE,
    QUERY_TIMEOUT_MS,
    MCP_TRANSPORT,
    MCP_PORT,
    HOST,
  };
}

export function getConfig(): Config {
  return parseConfig(process.env);
}
