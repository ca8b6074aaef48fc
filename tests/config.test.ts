import test from "node:test";
import assert from "node:assert/strict";
import { parseConfig } from "../src/config.js";
import { initLogger, type LoggerBackend } from "../src/logger.js";

function withLoggerWarnings(): { warnings: string[] } {
  const warnings: string[] = [];
  const backend: LoggerBackend = {
    info() {},
    warn(msg: string) {
      warnings.push(msg);
    },
    error() {},
    debug() {},
  };
  initLogger(backend, false);
  return { warnings };
}

function withEnv(name: string, value: string | undefined, fn: () => void): void {
  const original = process.env[name];
  if (value === undefined) delete process.env[name];
  else process.env[name] = value;
  try {
    fn();
  } finally {
    if (original === undefined) delete process.env[name];
    else process.env[name] = original;
  }
}

test("defaults apply when config is empty", () => {
  withLoggerWarnings();
  withEnv("OPENAI_BASE_URL", undefined, () => {
    const cfg = parseConfig(undefined);

    assert.equal(cfg.model, "gpt-4o-mini");
    assert.equal(cfg.embeddingModel, "text-embedding-3-small");
    assert.equal(cfg.userId, "default");
    assert.equal(cfg.shortTermCapacity, 10);
    assert.equal(cfg.topicSimilarityThreshold, 0.5);
    assert.equal(cfg.collaboratorTimeoutMs, 60_000);
    assert.equal(cfg.debug, false);
    assert.equal(cfg.openaiBaseUrl, undefined);
    assert.match(cfg.memoryDir, /\.memory-tiers$/);
  });
});

test("openaiApiKey supports ${ENV_VAR} expansion", () => {
  withLoggerWarnings();
  withEnv("TEST_MEMORY_TIERS_KEY", "test-secret", () => {
    const cfg = parseConfig({ openaiApiKey: "${TEST_MEMORY_TIERS_KEY}" });
    assert.equal(cfg.openaiApiKey, "test-secret");
  });
});

test("an unset ${ENV_VAR} reference is an error", () => {
  withEnv("TEST_MEMORY_TIERS_MISSING", undefined, () => {
    assert.throws(
      () => parseConfig({ openaiApiKey: "${TEST_MEMORY_TIERS_MISSING}" }),
      /Environment variable TEST_MEMORY_TIERS_MISSING is not set/,
    );
  });
});

test("openaiBaseUrl falls back to OPENAI_BASE_URL and drops trailing slashes", () => {
  const { warnings } = withLoggerWarnings();
  withEnv("OPENAI_BASE_URL", "https://fallback.example.test/v1/", () => {
    const cfg = parseConfig({ openaiApiKey: "test-secret" });
    assert.equal(cfg.openaiBaseUrl, "https://fallback.example.test/v1");
  });
  assert.equal(warnings.length, 0);
});

test("openaiBaseUrl rejects unsupported schemes", () => {
  const { warnings } = withLoggerWarnings();
  const cfg = parseConfig({ openaiBaseUrl: "ftp://provider.example.test/v1" });

  assert.equal(cfg.openaiBaseUrl, undefined);
  assert.ok(warnings.some((w) => w.includes("unsupported URL scheme")));
});

test("openaiBaseUrl warns when using insecure http", () => {
  const { warnings } = withLoggerWarnings();
  const cfg = parseConfig({ openaiBaseUrl: "http://localhost:1234/v1" });

  assert.equal(cfg.openaiBaseUrl, "http://localhost:1234/v1");
  assert.ok(warnings.some((w) => w.includes("insecure http")));
});

test("numeric options accept numeric strings and reject out-of-range values", () => {
  const { warnings } = withLoggerWarnings();
  withEnv("OPENAI_BASE_URL", undefined, () => {
    const cfg = parseConfig({
      shortTermCapacity: "4",
      topicSimilarityThreshold: -1,
      collaboratorTimeoutMs: 0,
    });

    assert.equal(cfg.shortTermCapacity, 4);
    assert.equal(cfg.topicSimilarityThreshold, 0.5);
    assert.equal(cfg.collaboratorTimeoutMs, 0);
  });
  assert.deepEqual(warnings, ["[memory-tiers] ignoring invalid topicSimilarityThreshold (-1); using 0.5"]);
});

test("a fractional capacity falls back to the default", () => {
  withLoggerWarnings();
  assert.equal(parseConfig({ shortTermCapacity: 2.5 }).shortTermCapacity, 10);
});
