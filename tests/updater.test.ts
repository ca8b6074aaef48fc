import test from "node:test";
import assert from "node:assert/strict";
import { MemoryUpdater } from "../src/updater.js";
import { PromotionError } from "../src/errors.js";
import { initLogger } from "../src/logger.js";
import type { RawTurn } from "../src/types.js";
import { FakeBackend, FakeLongTerm, FakeMidTerm, FakeShortTerm, turn } from "./fakes.js";

initLogger({ info() {}, warn() {}, error() {}, debug() {} }, false);

function setup(turns: RawTurn[], backend: FakeBackend, capacity = 1) {
  const shortTerm = new FakeShortTerm(turns, capacity);
  const midTerm = new FakeMidTerm();
  const longTerm = new FakeLongTerm();
  const updater = new MemoryUpdater(
    { shortTerm, midTerm, longTerm, backend },
    { topicSimilarityThreshold: 0.5 },
  );
  return { shortTerm, midTerm, longTerm, updater };
}

test("three evicted turns: continuous pair linked both ways, third starts fresh", async () => {
  const backend = new FakeBackend({ continuity: (_prev, curr) => curr.userInput === "user says 2" });
  const { midTerm, updater } = setup([turn(1), turn(2), turn(3)], backend);

  const outcome = await updater.processShortTermToMidTerm(null);

  assert.equal(outcome.pages.length, 3);
  assert.equal(new Set(outcome.pages.map((p) => p.pageId)).size, 3);
  const [p1, p2, p3] = outcome.pages.map((p) => midTerm.pages.get(p.pageId));
  assert.ok(p1 && p2 && p3);

  assert.equal(p1.nextPage, p2.pageId);
  assert.equal(p2.prePage, p1.pageId);
  assert.equal(p2.metaInfo, p1.metaInfo);
  assert.equal(p3.prePage, null);
  assert.equal(p3.metaInfo, "about user says 3");
  assert.equal(outcome.cursor, outcome.pages[2]);

  for (const page of outcome.pages) {
    assert.deepEqual(page.embedding, [0.6, 0.8]);
    assert.deepEqual(page.keywords, ["alpha", "beta"]);
  }
  assert.equal(outcome.segmentation?.usedFallback, true);
  assert.equal(midTerm.saves, 1);
});

test("turns missing a side of the exchange are dropped during eviction", async () => {
  const backend = new FakeBackend();
  const { shortTerm, updater } = setup(
    [{ userInput: "", agentResponse: "orphan reply" }, turn(1), { userInput: "unanswered" }],
    backend,
  );

  const outcome = await updater.processShortTermToMidTerm(null);

  assert.equal(outcome.pages.length, 1);
  assert.equal(outcome.pages[0].userInput, "user says 1");
  assert.equal(shortTerm.turns.length, 0);
});

test("eviction stops once the buffer is back under capacity", async () => {
  const backend = new FakeBackend();
  const { shortTerm, updater } = setup([turn(1), turn(2), turn(3), turn(4), turn(5)], backend, 3);

  const turns = await updater.drainShortTerm();

  assert.deepEqual(
    turns.map((t) => t.userInput),
    ["user says 1", "user says 2", "user says 3"],
  );
  assert.equal(shortTerm.turns.length, 2);
});

test("nothing to evict is a no-op that keeps the cursor", async () => {
  const backend = new FakeBackend();
  const { midTerm, updater } = setup([turn(1)], backend, 5);

  const outcome = await updater.processShortTermToMidTerm(null);

  assert.deepEqual(outcome, { cursor: null, pages: [], segmentation: null });
  assert.equal(backend.calls.length, 0);
  assert.equal(midTerm.saves, 0);
});

test("two themes over a two-page batch: both inserts carry both pages, edge linked once", async () => {
  const backend = new FakeBackend({
    continuity: () => true,
    summaries: {
      summaries: [
        { theme: "a", content: "Theme A", keywords: ["a"] },
        { theme: "b", content: "Theme B", keywords: ["b"] },
      ],
    },
  });
  const { midTerm, updater } = setup([turn(1), turn(2)], backend);

  const { pages } = await updater.processShortTermToMidTerm(null);

  assert.equal(midTerm.inserts.length, 2);
  for (const insert of midTerm.inserts) {
    assert.deepEqual(
      insert.pages.map((p) => p.pageId),
      pages.map((p) => p.pageId),
    );
  }
  assert.deepEqual(midTerm.connections, [[pages[0].pageId, pages[1].pageId]]);
});

test("the returned cursor links the next batch to the stored chain", async () => {
  const backend = new FakeBackend({ continuity: () => true });
  const { shortTerm, midTerm, updater } = setup([turn(1)], backend);

  const first = await updater.processShortTermToMidTerm(null);
  shortTerm.turns.push(turn(2));
  const second = await updater.processShortTermToMidTerm(first.cursor);

  const stored = midTerm.pages.get(first.pages[0].pageId);
  const next = second.pages[0];
  assert.equal(next.prePage, first.pages[0].pageId);
  assert.equal(stored?.nextPage, next.pageId);
  assert.equal(stored?.metaInfo, "about user says 1 + user says 2");
  assert.equal(next.metaInfo, "about user says 1 + user says 2");
  assert.equal(second.cursor, next);
});

test("a summarizer failure aborts the batch with the evicted turns attached", async () => {
  const backend = new FakeBackend();
  backend.generateMultiSummary = async () => {
    throw new Error("llm down");
  };
  const { shortTerm, midTerm, updater } = setup([turn(1), turn(2)], backend);

  await assert.rejects(updater.processShortTermToMidTerm(null), (err: unknown) => {
    assert.ok(err instanceof PromotionError);
    assert.equal(err.stage, "segment");
    assert.deepEqual(
      err.evictedTurns.map((t) => t.userInput),
      ["user says 1", "user says 2"],
    );
    return true;
  });
  assert.equal(shortTerm.turns.length, 0);
  assert.equal(midTerm.inserts.length, 0);
  assert.equal(midTerm.saves, 0);
});

test("updateLongTermFromAnalysis hands the analysis to the knowledge promoter", async () => {
  const { longTerm, updater } = setup([], new FakeBackend());

  const result = await updater.updateLongTermFromAnalysis("u1", {
    profile: "Likes tea",
    private: "- drinks oolong",
    assistantKnowledge: "none",
  });

  assert.deepEqual(result, { profileUpdated: true, userKnowledgeAdded: 1, assistantKnowledgeAdded: 0 });
  assert.equal(longTerm.profiles.get("u1"), "Likes tea");
  assert.deepEqual(longTerm.userKnowledge, ["drinks oolong"]);
});
