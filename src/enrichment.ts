import { log } from "./logger.js";
import { describeError } from "./errors.js";
import { dedupeKeywords } from "./llm-backend.js";
import { normalizeVector } from "./vector.js";
import type { MemoryBackend, Page } from "./types.js";

export function hasEmbedding(page: Page): boolean {
  return Array.isArray(page.embedding) && page.embedding.length > 0;
}

export function hasKeywords(page: Page): boolean {
  return Array.isArray(page.keywords) && page.keywords.length > 0;
}

export function pageText(page: Page): string {
  return `User: ${page.userInput} Assistant: ${page.agentResponse}`;
}

/**
 * Fills in a page's embedding and keywords. Each missing attribute is its
 * own task; the two run concurrently and a failure in one leaves the other
 * untouched.
 */
export class PageEnricher {
  constructor(private readonly backend: Pick<MemoryBackend, "getEmbedding" | "extractKeywords">) {}

  async enrich(page: Page): Promise<Page> {
    const needsEmbedding = !hasEmbedding(page);
    const needsKeywords = !hasKeywords(page);
    if (!needsEmbedding && !needsKeywords) {
      log.debug(`enrich: page ${page.pageId} already has embedding and keywords`);
      return page;
    }

    const text = pageText(page);
    const [embedding, keywords] = await Promise.all([
      needsEmbedding ? this.isolate(page.pageId, "embedding", () => this.computeEmbedding(text)) : null,
      needsKeywords ? this.isolate(page.pageId, "keywords", () => this.computeKeywords(text)) : null,
    ]);

    if (embedding) page.embedding = embedding;
    if (keywords) page.keywords = keywords;
    return page;
  }

  private async computeEmbedding(text: string): Promise<number[]> {
    const raw = await this.backend.getEmbedding(text);
    const unit = normalizeVector(raw);
    if (!unit) throw new Error(`cannot normalise a ${raw.length}-dim vector with zero or non-finite norm`);
    return unit;
  }

  private async computeKeywords(text: string): Promise<string[]> {
    const keywords = dedupeKeywords(await this.backend.extractKeywords(text));
    if (keywords.length === 0) throw new Error("no keywords returned");
    return keywords;
  }

  private async isolate<T>(pageId: string, attribute: string, task: () => Promise<T>): Promise<T | null> {
    try {
      return await task();
    } catch (err) {
      log.warn(`enrich: ${attribute} computation failed for page ${pageId}: ${describeError(err)}`);
      return null;
    }
  }
}
