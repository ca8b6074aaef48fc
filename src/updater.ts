import { log } from "./logger.js";
import { ContinuityLinker } from "./continuity.js";
import { PageEnricher } from "./enrichment.js";
import { PromotionError, type PromotionStage } from "./errors.js";
import { finalizeConnections } from "./finalizer.js";
import { nowIso } from "./ids.js";
import { KnowledgePromoter, type KnowledgePromotionResult } from "./knowledge.js";
import { ThematicSegmenter, type SegmentationResult } from "./segmenter.js";
import type {
  ContinuityCursor,
  ConversationTurn,
  LongTermStore,
  MemoryBackend,
  MidTermStore,
  Page,
  ProfileAnalysis,
  RawTurn,
  ShortTermStore,
} from "./types.js";

export interface UpdaterDeps {
  shortTerm: ShortTermStore;
  midTerm: MidTermStore;
  longTerm: LongTermStore;
  backend: MemoryBackend;
}

export interface UpdaterOptions {
  topicSimilarityThreshold: number;
}

export interface PromotionOutcome {
  cursor: ContinuityCursor;
  pages: Page[];
  segmentation: SegmentationResult | null;
}

function toTurn(raw: RawTurn): ConversationTurn | null {
  if (!raw.userInput || !raw.agentResponse) return null;
  return {
    userInput: raw.userInput,
    agentResponse: raw.agentResponse,
    timestamp: raw.timestamp || nowIso(),
  };
}

/**
 * Drives turns from short-term to mid-term memory and analysis results into
 * long-term memory. Holds no cursor of its own: the caller passes the
 * current one in and keeps the one that comes back.
 */
export class MemoryUpdater {
  private readonly linker: ContinuityLinker;
  private readonly enricher: PageEnricher;
  private readonly segmenter: ThematicSegmenter;
  private readonly knowledge: KnowledgePromoter;

  constructor(
    private readonly deps: UpdaterDeps,
    options: UpdaterOptions,
  ) {
    this.linker = new ContinuityLinker(deps.backend, deps.midTerm);
    this.enricher = new PageEnricher(deps.backend);
    this.segmenter = new ThematicSegmenter(deps.backend, deps.midTerm, options.topicSimilarityThreshold);
    this.knowledge = new KnowledgePromoter(deps.longTerm);
  }

  /** Pops entries while the buffer is over capacity, oldest first. */
  async drainShortTerm(): Promise<ConversationTurn[]> {
    const turns: ConversationTurn[] = [];
    while (await this.deps.shortTerm.isFull()) {
      const raw = await this.deps.shortTerm.popOldest();
      if (!raw) break;
      const turn = toTurn(raw);
      if (turn) turns.push(turn);
    }
    return turns;
  }

  async processShortTermToMidTerm(cursor: ContinuityCursor): Promise<PromotionOutcome> {
    const turns = await this.drainShortTerm();
    if (turns.length === 0) {
      log.debug("no turns evicted from short-term memory");
      return { cursor, pages: [], segmentation: null };
    }

    log.info(`promoting ${turns.length} turns from short-term to mid-term memory`);

    const { pages, cursor: nextCursor } = await this.stage("link", turns, () =>
      this.linker.buildPages(turns, cursor),
    );

    await this.stage("enrich", turns, async () => {
      for (const page of pages) {
        await this.enricher.enrich(page);
      }
    });

    const segmentation = await this.stage("segment", turns, () => this.segmenter.segment(pages));

    await this.stage("finalize", turns, () => finalizeConnections(this.deps.midTerm, pages));

    log.info(
      `promoted ${pages.length} pages into ${segmentation.sessionIds.length} session placement(s)${segmentation.usedFallback ? " (fallback)" : ""}`,
    );
    return { cursor: nextCursor, pages, segmentation };
  }

  async updateLongTermFromAnalysis(
    userId: string,
    analysis: ProfileAnalysis | null | undefined,
  ): Promise<KnowledgePromotionResult> {
    return this.knowledge.promote(userId, analysis);
  }

  private async stage<T>(stage: PromotionStage, turns: ConversationTurn[], run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (err) {
      const wrapped = new PromotionError(stage, turns, err);
      log.error(wrapped.message);
      throw wrapped;
    }
  }
}
