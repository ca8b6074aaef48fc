import { log } from "./logger.js";
import type { MidTermStore, Page } from "./types.js";

/**
 * Registers every prePage/nextPage edge the batch carries with the mid-term
 * store so both endpoints point at each other, then saves once. Session
 * placement may have moved pages; the store resolves ids afresh. Returns
 * the number of distinct edges registered.
 */
export async function finalizeConnections(
  midTerm: Pick<MidTermStore, "updatePageConnections" | "save">,
  pages: readonly Page[],
): Promise<number> {
  const registered = new Set<string>();

  const register = async (fromId: string, toId: string): Promise<void> => {
    const key = `${fromId}\u0000${toId}`;
    if (registered.has(key)) return;
    registered.add(key);
    await midTerm.updatePageConnections(fromId, toId);
  };

  for (const page of pages) {
    if (page.prePage) await register(page.prePage, page.pageId);
    if (page.nextPage) await register(page.pageId, page.nextPage);
  }

  await midTerm.save();
  log.debug(`finalized ${registered.size} page connections for ${pages.length} pages`);
  return registered.size;
}
