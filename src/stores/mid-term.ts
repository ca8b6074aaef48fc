import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import { log } from "../logger.js";
import { generateId, nowIso } from "../ids.js";
import { MidTermStateSchema, type MidTermState } from "../schemas.js";
import { cosineSimilarity, keywordJaccard, normalizeVector } from "../vector.js";
import type { MidTermSession, MidTermStore, Page } from "../types.js";

export interface MidTermMemoryOptions {
  /** Embeds session summaries; without it sessions match on keywords only. */
  embed?: (text: string) => Promise<number[]>;
}

/** Appends keywords not yet present, comparing case-insensitively; first spelling wins. */
function unionKeywords(base: readonly string[], extra: readonly string[]): string[] {
  const seen = new Set(base.map((k) => k.toLowerCase()));
  const out = [...base];
  for (const k of extra) {
    const key = k.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(k);
  }
  return out;
}

/**
 * Page arena plus thematic sessions, persisted as one JSON document.
 *
 * A page lives once in the arena no matter how many sessions list it, so
 * a batch filed under two themes shares its records. `getPageById` hands
 * out the live record; edits to it are written by the next `save()`.
 */
export class MidTermMemory implements MidTermStore {
  private pages = new Map<string, Page>();
  private sessions = new Map<string, MidTermSession>();
  private loaded = false;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(
    private readonly filePath: string,
    private readonly options: MidTermMemoryOptions = {},
  ) {}

  async load(): Promise<void> {
    if (this.loaded) return;
    const state = await this.readState();
    if (state) {
      this.pages = new Map(state.pages.map((p): [string, Page] => [p.pageId, p]));
      this.sessions = new Map(state.sessions.map((s): [string, MidTermSession] => [s.id, s]));
    }
    this.loaded = true;
  }

  async getPageById(pageId: string): Promise<Page | null> {
    await this.load();
    return this.pages.get(pageId) ?? null;
  }

  async insertPagesIntoSession(
    summary: string,
    keywords: string[],
    pages: Page[],
    similarityThreshold: number,
  ): Promise<string> {
    await this.load();

    const embedding = this.options.embed
      ? (normalizeVector(await this.options.embed(summary)) ?? undefined)
      : undefined;

    let best: { session: MidTermSession; score: number } | null = null;
    for (const session of this.sessions.values()) {
      let score = keywordJaccard(keywords, session.keywords);
      if (embedding && session.embedding) score += cosineSimilarity(embedding, session.embedding);
      if (!best || score > best.score) best = { session, score };
    }

    const now = nowIso();
    let session: MidTermSession;
    if (best && best.score >= similarityThreshold) {
      session = best.session;
      session.keywords = unionKeywords(session.keywords, keywords);
      session.updatedAt = now;
      log.debug(`mid-term: merged ${pages.length} pages into session ${session.id} (score=${best.score.toFixed(3)})`);
    } else {
      session = {
        id: generateId("session"),
        summary,
        keywords: unionKeywords([], keywords),
        ...(embedding ? { embedding } : {}),
        pageIds: [],
        createdAt: now,
        updatedAt: now,
      };
      this.sessions.set(session.id, session);
      log.debug(`mid-term: created session ${session.id} for ${pages.length} pages`);
    }

    for (const page of pages) {
      if (!this.pages.has(page.pageId)) this.pages.set(page.pageId, page);
      if (!session.pageIds.includes(page.pageId)) session.pageIds.push(page.pageId);
    }
    return session.id;
  }

  async updatePageConnections(fromPageId: string, toPageId: string): Promise<void> {
    await this.load();
    const from = this.pages.get(fromPageId);
    const to = this.pages.get(toPageId);
    if (from) from.nextPage = toPageId;
    if (to) to.prePage = fromPageId;
    if (!from || !to) {
      log.debug(`mid-term: partial connection ${fromPageId} -> ${toPageId} (missing ${from ? toPageId : fromPageId})`);
    }
  }

  /** Writes are queued so overlapping saves land in call order. */
  save(): Promise<void> {
    const write = this.writeChain.then(() => this.writeState());
    // The caller of this save sees its failure; later saves still run.
    this.writeChain = write.catch((err: unknown) => {
      log.debug("mid-term: save failed", err);
    });
    return write;
  }

  getSession(sessionId: string): MidTermSession | null {
    return this.sessions.get(sessionId) ?? null;
  }

  listSessions(): MidTermSession[] {
    return [...this.sessions.values()];
  }

  getSessionIdsForPage(pageId: string): string[] {
    return this.listSessions()
      .filter((s) => s.pageIds.includes(pageId))
      .map((s) => s.id);
  }

  private async writeState(): Promise<void> {
    const state: MidTermState = {
      version: 1,
      pages: [...this.pages.values()],
      sessions: [...this.sessions.values()],
    };
    await mkdir(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.tmp`;
    await writeFile(tmp, JSON.stringify(state, null, 2), "utf-8");
    await rename(tmp, this.filePath);
  }

  private async readState(): Promise<MidTermState | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch {
      return null;
    }
    try {
      const parsed = MidTermStateSchema.safeParse(JSON.parse(raw));
      if (parsed.success) return parsed.data;
      log.warn(`mid-term state at ${this.filePath} has an unexpected shape; starting empty`);
    } catch (err) {
      log.warn(`mid-term state at ${this.filePath} is not valid JSON; starting empty`, err);
    }
    return null;
  }
}
