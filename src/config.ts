import os from "node:os";
import path from "node:path";
import type { MemoryConfig } from "./types.js";
import { log } from "./logger.js";

const DEFAULT_MEMORY_DIR = path.join(process.env.HOME ?? os.homedir(), ".memory-tiers");

const DEFAULT_MODEL = "gpt-4o-mini";
const DEFAULT_EMBEDDING_MODEL = "text-embedding-3-small";
const DEFAULT_SHORT_TERM_CAPACITY = 10;
const DEFAULT_TOPIC_SIMILARITY_THRESHOLD = 0.5;
const DEFAULT_COLLABORATOR_TIMEOUT_MS = 60_000;

function resolveEnvVars(value: string): string {
  return value.replace(/\$\{([^}]+)\}/g, (_, envVar: string) => {
    const envValue = process.env[envVar];
    if (!envValue) {
      throw new Error(`Environment variable ${envVar} is not set`);
    }
    return envValue;
  });
}

function normalizeOpenaiBaseUrl(value: string | undefined, source: "config" | "env"): string | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (trimmed.length === 0) return undefined;

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    log.warn(`ignoring invalid openaiBaseUrl from ${source}: not a valid URL`);
    return undefined;
  }

  if (parsed.protocol !== "https:" && parsed.protocol !== "http:") {
    log.warn(
      `ignoring openaiBaseUrl from ${source}: unsupported URL scheme (${parsed.protocol.replace(":", "")})`,
    );
    return undefined;
  }

  if (parsed.protocol === "http:") {
    log.warn(`openaiBaseUrl from ${source} is using insecure http; prefer https`);
  }

  return parsed.toString().replace(/\/+$/, "");
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : undefined;
}

function numberOption(
  cfg: Record<string, unknown>,
  key: string,
  fallback: number,
  accept: (n: number) => boolean,
): number {
  const raw = cfg[key];
  if (raw === undefined || raw === null) return fallback;
  const n = typeof raw === "number" ? raw : typeof raw === "string" ? Number(raw) : Number.NaN;
  if (!Number.isFinite(n) || !accept(n)) {
    log.warn(`ignoring invalid ${key} (${String(raw)}); using ${fallback}`);
    return fallback;
  }
  return n;
}

export function parseConfig(raw: unknown): MemoryConfig {
  const cfg: Record<string, unknown> =
    raw && typeof raw === "object" && !Array.isArray(raw) ? { ...raw } : {};

  // The key is optional at load time; the backend refuses to start without it.
  const configuredKey = nonEmptyString(cfg.openaiApiKey);
  const openaiApiKey = configuredKey ? resolveEnvVars(configuredKey) : process.env.OPENAI_API_KEY;

  const configuredBaseUrl = nonEmptyString(cfg.openaiBaseUrl);
  const openaiBaseUrl = configuredBaseUrl
    ? normalizeOpenaiBaseUrl(resolveEnvVars(configuredBaseUrl), "config")
    : normalizeOpenaiBaseUrl(process.env.OPENAI_BASE_URL, "env");

  const shortTermCapacity = numberOption(
    cfg,
    "shortTermCapacity",
    DEFAULT_SHORT_TERM_CAPACITY,
    (n) => Number.isInteger(n) && n >= 1,
  );
  const topicSimilarityThreshold = numberOption(
    cfg,
    "topicSimilarityThreshold",
    DEFAULT_TOPIC_SIMILARITY_THRESHOLD,
    (n) => n >= 0,
  );
  const collaboratorTimeoutMs = numberOption(
    cfg,
    "collaboratorTimeoutMs",
    DEFAULT_COLLABORATOR_TIMEOUT_MS,
    (n) => n >= 0,
  );

  return {
    openaiApiKey,
    openaiBaseUrl,
    model: nonEmptyString(cfg.model) ?? DEFAULT_MODEL,
    embeddingModel: nonEmptyString(cfg.embeddingModel) ?? DEFAULT_EMBEDDING_MODEL,
    memoryDir: nonEmptyString(cfg.memoryDir) ?? DEFAULT_MEMORY_DIR,
    userId: nonEmptyString(cfg.userId) ?? "default",
    shortTermCapacity,
    topicSimilarityThreshold,
    collaboratorTimeoutMs,
    debug: cfg.debug === true,
  };
}
