import test from "node:test";
import assert from "node:assert/strict";
import { CollaboratorError, PromotionError, withCollaboratorTimeout, withTimeout } from "../src/errors.js";
import { FakeBackend, makePage } from "./fakes.js";

test("withTimeout rejects a call that outlives the limit", async () => {
  const never = new Promise<number[]>(() => {});

  await assert.rejects(withTimeout("getEmbedding", 10, () => never), (err: unknown) => {
    assert.ok(err instanceof CollaboratorError);
    assert.equal(err.operation, "getEmbedding");
    assert.equal(err.message, "getEmbedding: timed out after 10ms");
    return true;
  });
});

test("withTimeout passes through results and failures of the task", async () => {
  assert.equal(await withTimeout("extractKeywords", 1_000, async () => 42), 42);
  await assert.rejects(
    withTimeout("extractKeywords", 1_000, async () => {
      throw new Error("quota exceeded");
    }),
    /^Error: quota exceeded$/,
  );
});

test("a zero timeout disables the race", async () => {
  assert.equal(await withTimeout("checkContinuity", 0, async () => "direct"), "direct");
  const backend = new FakeBackend();
  assert.equal(withCollaboratorTimeout(backend, 0), backend);
});

test("withCollaboratorTimeout forwards every operation", async () => {
  const inner = new FakeBackend({ continuity: () => true });
  const wrapped = withCollaboratorTimeout(inner, 1_000);
  const prev = makePage({ pageId: "a" });
  const curr = makePage({ pageId: "b" });

  assert.equal(await wrapped.checkContinuity(prev, curr), true);
  assert.equal(await wrapped.generatePageMetaInfo(null, curr), "about question b");
  assert.deepEqual(await wrapped.generateMultiSummary("text"), { summaries: [] });
  assert.deepEqual(await wrapped.extractKeywords("text"), ["alpha", "beta"]);
  assert.deepEqual(await wrapped.getEmbedding("text"), [3, 4]);
  assert.deepEqual(
    inner.calls.map((c) => c.op),
    ["checkContinuity", "generatePageMetaInfo", "generateMultiSummary", "extractKeywords", "getEmbedding"],
  );
});

test("PromotionError names the stage and keeps the cause", () => {
  const cause = new CollaboratorError("generateMultiSummary", "timed out after 5ms");
  const err = new PromotionError(
    "segment",
    [{ userInput: "u", agentResponse: "a", timestamp: "2026-01-01T00:00:00.000Z" }],
    cause,
  );

  assert.equal(
    err.message,
    "promotion failed during segment (1 evicted turns): generateMultiSummary: timed out after 5ms",
  );
  assert.equal(err.cause, cause);
});
