import type { ConversationTurn, MemoryBackend } from "./types.js";

export type BackendOperation = keyof MemoryBackend;

/** A backend (LLM/embedding) call failed or timed out. */
export class CollaboratorError extends Error {
  readonly operation: BackendOperation;

  constructor(operation: BackendOperation, message: string, options?: { cause?: unknown }) {
    super(`${operation}: ${message}`, options);
    this.name = "CollaboratorError";
    this.operation = operation;
  }
}

export type PromotionStage = "link" | "enrich" | "segment" | "finalize";

/**
 * A short-term → mid-term batch aborted part way. The evicted turns are
 * already gone from short-term memory; they ride along so the caller can
 * decide whether to retry.
 */
export class PromotionError extends Error {
  readonly stage: PromotionStage;
  readonly evictedTurns: ConversationTurn[];

  constructor(stage: PromotionStage, evictedTurns: ConversationTurn[], cause: unknown) {
    super(`promotion failed during ${stage} (${evictedTurns.length} evicted turns): ${describeError(cause)}`, {
      cause,
    });
    this.name = "PromotionError";
    this.stage = stage;
    this.evictedTurns = evictedTurns;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Race `task` against a timer. The timer is always cleared so a settled
 * call never keeps the event loop alive.
 */
export async function withTimeout<T>(
  operation: BackendOperation,
  timeoutMs: number,
  task: () => Promise<T>,
): Promise<T> {
  if (timeoutMs <= 0) return task();

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new CollaboratorError(operation, `timed out after ${timeoutMs}ms`)),
      timeoutMs,
    );
  });

  try {
    return await Promise.race([task(), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/** Wrap every backend call with `withTimeout`. */
export function withCollaboratorTimeout(backend: MemoryBackend, timeoutMs: number): MemoryBackend {
  if (timeoutMs <= 0) return backend;
  return {
    checkContinuity: (prevPage, currPage) =>
      withTimeout("checkContinuity", timeoutMs, () => backend.checkContinuity(prevPage, currPage)),
    generatePageMetaInfo: (prevMetaInfo, currPage) =>
      withTimeout("generatePageMetaInfo", timeoutMs, () =>
        backend.generatePageMetaInfo(prevMetaInfo, currPage),
      ),
    generateMultiSummary: (text) =>
      withTimeout("generateMultiSummary", timeoutMs, () => backend.generateMultiSummary(text)),
    extractKeywords: (text) =>
      withTimeout("extractKeywords", timeoutMs, () => backend.extractKeywords(text)),
    getEmbedding: (text) => withTimeout("getEmbedding", timeoutMs, () => backend.getEmbedding(text)),
  };
}
