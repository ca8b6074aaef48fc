export { parseConfig } from "./config.js";
export { initLogger, log, type LoggerBackend } from "./logger.js";
export {
  CollaboratorError,
  PromotionError,
  withCollaboratorTimeout,
  withTimeout,
  type BackendOperation,
  type PromotionStage,
} from "./errors.js";
export { normalizeVector, cosineSimilarity, keywordJaccard } from "./vector.js";
export { ContinuityLinker, createPage, type LinkedBatch } from "./continuity.js";
export { PageEnricher, pageText } from "./enrichment.js";
export {
  ThematicSegmenter,
  batchTranscript,
  DEFAULT_THEME_SUMMARY,
  FALLBACK_SESSION_SUMMARY,
  type SegmentationResult,
} from "./segmenter.js";
export { finalizeConnections } from "./finalizer.js";
export {
  KnowledgePromoter,
  knowledgeLines,
  isMeaningfulProfile,
  type KnowledgePromotionResult,
} from "./knowledge.js";
export { MemoryUpdater, type PromotionOutcome, type UpdaterDeps, type UpdaterOptions } from "./updater.js";
export {
  LlmMemoryBackend,
  OpenAiStructuredLlm,
  type StructuredLlm,
  type StructuredRequest,
} from "./llm-backend.js";
export { ShortTermMemory } from "./stores/short-term.js";
export { MidTermMemory, type MidTermMemoryOptions } from "./stores/mid-term.js";
export { LongTermMemory } from "./stores/long-term.js";
export { MemoryTiers, createMemoryTiers, type MemoryTiersParts } from "./orchestrator.js";
export type * from "./types.js";
