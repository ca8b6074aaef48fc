import path from "node:path";
import { initLogger, log, type LoggerBackend } from "./logger.js";
import { withCollaboratorTimeout, withTimeout } from "./errors.js";
import type { KnowledgePromotionResult } from "./knowledge.js";
import { LlmMemoryBackend, OpenAiStructuredLlm } from "./llm-backend.js";
import { LongTermMemory } from "./stores/long-term.js";
import { MidTermMemory } from "./stores/mid-term.js";
import { ShortTermMemory } from "./stores/short-term.js";
import { MemoryUpdater, type PromotionOutcome } from "./updater.js";
import type {
  ContinuityCursor,
  MemoryBackend,
  MemoryConfig,
  ProfileAnalysis,
  RawTurn,
} from "./types.js";

export interface MemoryTiersParts {
  shortTerm: ShortTermMemory;
  midTerm: MidTermMemory;
  longTerm: LongTermMemory;
  backend: MemoryBackend;
}

/**
 * Top-level owner of one memory instance: it holds the continuity cursor
 * and runs promotions and long-term updates one at a time, in call order.
 */
export class MemoryTiers {
  private cursor: ContinuityCursor = null;
  private tail: Promise<unknown> = Promise.resolve();
  private readonly updater: MemoryUpdater;

  constructor(
    private readonly config: MemoryConfig,
    private readonly parts: MemoryTiersParts,
  ) {
    this.updater = new MemoryUpdater(
      {
        shortTerm: parts.shortTerm,
        midTerm: parts.midTerm,
        longTerm: parts.longTerm,
        backend: withCollaboratorTimeout(parts.backend, config.collaboratorTimeoutMs),
      },
      { topicSimilarityThreshold: config.topicSimilarityThreshold },
    );
  }

  async initialize(): Promise<void> {
    await Promise.all([this.parts.shortTerm.load(), this.parts.midTerm.load()]);
    log.info(
      `initialized (userId=${this.config.userId}, shortTermCapacity=${this.config.shortTermCapacity}, topicSimilarityThreshold=${this.config.topicSimilarityThreshold})`,
    );
  }

  /** Buffers a turn; promotes the overflow once the buffer is full. */
  async addTurn(turn: RawTurn): Promise<PromotionOutcome | null> {
    const full = await this.parts.shortTerm.addTurn(turn);
    if (!full) return null;
    return this.promote();
  }

  /**
   * Runs one short-term → mid-term promotion. The cursor advances only when
   * the promotion succeeds; on failure the rejection reaches the caller and
   * the previous cursor stays in place.
   */
  promote(): Promise<PromotionOutcome> {
    return this.exclusive(async () => {
      const outcome = await this.updater.processShortTermToMidTerm(this.cursor);
      this.cursor = outcome.cursor;
      return outcome;
    });
  }

  updateLongTerm(analysis: ProfileAnalysis | null | undefined): Promise<KnowledgePromotionResult> {
    return this.exclusive(() => this.updater.updateLongTermFromAnalysis(this.config.userId, analysis));
  }

  getCursor(): ContinuityCursor {
    return this.cursor;
  }

  async close(): Promise<void> {
    await this.tail;
    this.parts.longTerm.close();
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task, task);
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}

/**
 * Wires file/SQLite stores under `memoryDir` and the OpenAI backend, and
 * points package logging at `logger` (console when omitted).
 */
export function createMemoryTiers(config: MemoryConfig, logger?: LoggerBackend): MemoryTiers {
  initLogger(logger, config.debug);
  const backend = new LlmMemoryBackend(new OpenAiStructuredLlm(config));
  return new MemoryTiers(config, {
    shortTerm: new ShortTermMemory(path.join(config.memoryDir, "short-term.json"), config.shortTermCapacity),
    midTerm: new MidTermMemory(path.join(config.memoryDir, "mid-term.json"), {
      embed: (text) =>
        withTimeout("getEmbedding", config.collaboratorTimeoutMs, () => backend.getEmbedding(text)),
    }),
    longTerm: new LongTermMemory(path.join(config.memoryDir, "long-term.sqlite"), config.userId),
    backend,
  });
}
