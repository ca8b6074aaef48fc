import { log } from "./logger.js";
import type { MemoryBackend, MidTermStore, Page } from "./types.js";

export const DEFAULT_THEME_SUMMARY = "General summary of recent interactions.";
export const FALLBACK_SESSION_SUMMARY = "General conversation segment from short-term memory.";

export interface SegmentationResult {
  sessionIds: string[];
  themes: string[];
  usedFallback: boolean;
}

export function batchTranscript(pages: readonly Page[]): string {
  return pages.map((p) => `User: ${p.userInput}\nAssistant: ${p.agentResponse}`).join("\n");
}

/**
 * Places an evicted batch into mid-term sessions, once per theme the
 * summarizer finds. Every theme receives the whole batch; the page objects
 * are shared between themes, never copied.
 */
export class ThematicSegmenter {
  constructor(
    private readonly backend: Pick<MemoryBackend, "generateMultiSummary" | "extractKeywords">,
    private readonly midTerm: Pick<MidTermStore, "insertPagesIntoSession">,
    private readonly similarityThreshold: number,
  ) {}

  async segment(pages: Page[]): Promise<SegmentationResult> {
    if (pages.length === 0) return { sessionIds: [], themes: [], usedFallback: false };

    const transcript = batchTranscript(pages);
    log.debug(`segmenting ${pages.length} pages (${transcript.length} chars)`);
    const { summaries } = await this.backend.generateMultiSummary(transcript);

    if (summaries.length === 0) {
      log.info("no themes found for evicted batch; adding it as a general session");
      const keywords = await this.backend.extractKeywords(transcript);
      const sessionId = await this.midTerm.insertPagesIntoSession(
        FALLBACK_SESSION_SUMMARY,
        keywords,
        pages,
        this.similarityThreshold,
      );
      return { sessionIds: [sessionId], themes: [], usedFallback: true };
    }

    const sessionIds: string[] = [];
    const themes: string[] = [];
    for (const summary of summaries) {
      log.info(`placing batch under theme "${summary.theme}"`);
      const sessionId = await this.midTerm.insertPagesIntoSession(
        summary.content || DEFAULT_THEME_SUMMARY,
        summary.keywords,
        pages,
        this.similarityThreshold,
      );
      sessionIds.push(sessionId);
      themes.push(summary.theme);
    }
    return { sessionIds, themes, usedFallback: false };
  }
}
