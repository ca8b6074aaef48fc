import { log } from "./logger.js";
import { generateId, nowIso } from "./ids.js";
import type { ContinuityCursor, ConversationTurn, MemoryBackend, MidTermStore, Page } from "./types.js";

export interface LinkedBatch {
  pages: Page[];
  /** The batch's last page; the caller carries it into the next promotion. */
  cursor: ContinuityCursor;
}

export function createPage(turn: ConversationTurn): Page {
  return {
    pageId: generateId("page"),
    userInput: turn.userInput,
    agentResponse: turn.agentResponse,
    timestamp: turn.timestamp || nowIso(),
    preloaded: false,
    analyzed: false,
    prePage: null,
    nextPage: null,
    metaInfo: null,
  };
}

/**
 * Builds pages for an evicted batch, decides where each continues a chain,
 * and keeps meta-info uniform across every chain it extends.
 *
 * Pages are addressed by id only. A lookup consults the current batch
 * first and the mid-term store second, so a chain that starts in an
 * earlier batch and runs into this one is walked as one graph.
 */
export class ContinuityLinker {
  constructor(
    private readonly backend: Pick<MemoryBackend, "checkContinuity" | "generatePageMetaInfo">,
    private readonly midTerm: Pick<MidTermStore, "getPageById" | "save">,
  ) {}

  async buildPages(turns: ConversationTurn[], cursor: ContinuityCursor): Promise<LinkedBatch> {
    const batch = new Map<string, Page>();
    const pages: Page[] = [];
    let prev = cursor ? ((await this.midTerm.getPageById(cursor.pageId)) ?? cursor) : null;

    for (const turn of turns) {
      const page = createPage(turn);
      const continuous = await this.backend.checkContinuity(prev, page);

      if (continuous && prev) {
        page.prePage = prev.pageId;
        page.metaInfo = await this.backend.generatePageMetaInfo(prev.metaInfo, page);
        const inChain = batch.has(prev.pageId) || (await this.midTerm.getPageById(prev.pageId)) !== null;
        if (inChain) {
          await this.propagateMetaInfo(prev.pageId, page.metaInfo, batch);
        }
      } else {
        page.metaInfo = await this.backend.generatePageMetaInfo(null, page);
      }

      batch.set(page.pageId, page);
      pages.push(page);
      prev = page;
    }

    const last = pages.at(-1) ?? null;
    log.debug(`linked ${pages.length} pages; cursor=${last?.pageId ?? "none"}`);
    return { pages, cursor: last ?? cursor };
  }

  /**
   * Breadth-first walk over prePage/nextPage edges from `startPageId`,
   * stamping `metaInfo` on every reachable page. Returns how many pages
   * changed. Saves the mid-term store once when a stored page changed.
   */
  async propagateMetaInfo(
    startPageId: string,
    metaInfo: string,
    batch: ReadonlyMap<string, Page> = new Map(),
  ): Promise<number> {
    const queue = [startPageId];
    const visited = new Set(queue);
    let changed = 0;
    let storedChanged = false;

    for (let head = 0; head < queue.length; head++) {
      const id = queue[head];
      const local = batch.get(id);
      const page = local ?? (await this.midTerm.getPageById(id));
      if (!page) continue;

      if (page.metaInfo !== metaInfo) {
        page.metaInfo = metaInfo;
        changed++;
        if (!local) storedChanged = true;
      }

      for (const next of [page.prePage, page.nextPage]) {
        if (next && !visited.has(next)) {
          visited.add(next);
          queue.push(next);
        }
      }
    }

    if (storedChanged) {
      await this.midTerm.save();
    }
    if (changed > 0) {
      log.debug(`meta-info propagated from ${startPageId} to ${changed} pages`);
    }
    return changed;
  }
}
