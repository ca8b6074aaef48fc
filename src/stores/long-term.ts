import { mkdirSync } from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { log } from "../logger.js";
import { generateId, nowIso } from "../ids.js";
import { LONG_TERM_SCHEMA_VERSION, LONG_TERM_TABLES_SQL } from "./sqlite-schema.js";
import type { KnowledgeItem, KnowledgeOwner, LongTermStore } from "../types.js";

type KnowledgeRow = { id: string; owner: KnowledgeOwner; text: string; created_at: string };

/**
 * User profiles and user/assistant knowledge in SQLite. Knowledge added
 * through the `LongTermStore` methods belongs to the user this instance was
 * opened for; profiles are keyed by the user id passed in.
 */
export class LongTermMemory implements LongTermStore {
  private readonly db: Database.Database;
  private seq: number;

  constructor(
    dbPath: string,
    private readonly userId: string,
  ) {
    if (dbPath !== ":memory:") mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(LONG_TERM_TABLES_SQL);
    this.checkSchemaVersion();

    const row = this.db
      .prepare<[], { maxSeq: number | null }>("SELECT MAX(seq) AS maxSeq FROM knowledge")
      .get();
    this.seq = row?.maxSeq ?? 0;
  }

  async updateUserProfile(userId: string, text: string, merge: boolean): Promise<void> {
    const existing = await this.getUserProfile(userId);
    const profile = merge && existing ? `${existing}\n${text}` : text;
    this.db
      .prepare(
        `INSERT INTO user_profiles(user_id, profile, updated_at) VALUES (?, ?, ?)
         ON CONFLICT(user_id) DO UPDATE SET profile = excluded.profile, updated_at = excluded.updated_at`,
      )
      .run(userId, profile, nowIso());
    log.debug(`long-term: profile for ${userId} ${merge && existing ? "merged" : "replaced"}`);
  }

  async getUserProfile(userId: string): Promise<string | null> {
    const row = this.db
      .prepare<[string], { profile: string }>("SELECT profile FROM user_profiles WHERE user_id = ?")
      .get(userId);
    return row?.profile ?? null;
  }

  async addUserKnowledge(text: string): Promise<void> {
    this.insertKnowledge("user", text);
  }

  async addAssistantKnowledge(text: string): Promise<void> {
    this.insertKnowledge("assistant", text);
  }

  async listKnowledge(owner: KnowledgeOwner): Promise<KnowledgeItem[]> {
    const rows = this.db
      .prepare<[string, KnowledgeOwner], KnowledgeRow>(
        "SELECT id, owner, text, created_at FROM knowledge WHERE user_id = ? AND owner = ? ORDER BY seq",
      )
      .all(this.userId, owner);
    return rows.map((r) => ({ id: r.id, owner: r.owner, text: r.text, createdAt: r.created_at }));
  }

  close(): void {
    this.db.close();
  }

  private insertKnowledge(owner: KnowledgeOwner, text: string): void {
    this.seq += 1;
    this.db
      .prepare("INSERT INTO knowledge(id, user_id, owner, text, created_at, seq) VALUES (?, ?, ?, ?, ?, ?)")
      .run(generateId(owner === "user" ? "uk" : "ak"), this.userId, owner, text, nowIso(), this.seq);
  }

  private checkSchemaVersion(): void {
    const row = this.db
      .prepare<[string], { value: string }>("SELECT value FROM meta WHERE key = ?")
      .get("schemaVersion");
    if (!row) {
      this.db
        .prepare("INSERT INTO meta(key, value) VALUES (?, ?)")
        .run("schemaVersion", String(LONG_TERM_SCHEMA_VERSION));
      return;
    }
    if (row.value !== String(LONG_TERM_SCHEMA_VERSION)) {
      throw new Error(`unsupported long-term schemaVersion: ${row.value}`);
    }
  }
}
