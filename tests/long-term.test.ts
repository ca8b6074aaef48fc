import test from "node:test";
import assert from "node:assert/strict";
import os from "node:os";
import path from "node:path";
import { mkdtemp, rm } from "node:fs/promises";
import { LongTermMemory } from "../src/stores/long-term.js";

test("updateUserProfile replaces, or appends when merging", async () => {
  const ltm = new LongTermMemory(":memory:", "u1");
  try {
    await ltm.updateUserProfile("u1", "Enjoys hiking", false);
    await ltm.updateUserProfile("u1", "Prefers mornings", false);
    assert.equal(await ltm.getUserProfile("u1"), "Prefers mornings");

    await ltm.updateUserProfile("u1", "Owns a dog", true);
    assert.equal(await ltm.getUserProfile("u1"), "Prefers mornings\nOwns a dog");

    assert.equal(await ltm.getUserProfile("someone-else"), null);
  } finally {
    ltm.close();
  }
});

test("knowledge is kept per owner in insertion order", async () => {
  const ltm = new LongTermMemory(":memory:", "u1");
  try {
    await ltm.addUserKnowledge("lives in Porto");
    await ltm.addAssistantKnowledge("suggested a train route");
    await ltm.addUserKnowledge("allergic to peanuts");

    const user = await ltm.listKnowledge("user");
    assert.deepEqual(
      user.map((k) => [k.owner, k.text]),
      [
        ["user", "lives in Porto"],
        ["user", "allergic to peanuts"],
      ],
    );
    const assistant = await ltm.listKnowledge("assistant");
    assert.deepEqual(
      assistant.map((k) => k.text),
      ["suggested a train route"],
    );
  } finally {
    ltm.close();
  }
});

test("knowledge persists across reopen and keeps ordering", async () => {
  const dir = await mkdtemp(path.join(os.tmpdir(), "memory-tiers-long-"));
  const dbPath = path.join(dir, "db", "long-term.sqlite");
  try {
    const first = new LongTermMemory(dbPath, "u1");
    await first.addUserKnowledge("first fact");
    first.close();

    const second = new LongTermMemory(dbPath, "u1");
    await second.addUserKnowledge("second fact");
    assert.deepEqual(
      (await second.listKnowledge("user")).map((k) => k.text),
      ["first fact", "second fact"],
    );
    second.close();
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});
