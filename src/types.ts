export interface ConversationTurn {
  userInput: string;
  agentResponse: string;
  /** ISO-8601 */
  timestamp: string;
}

/** A short-term entry as stored; fields may be missing or empty. */
export interface RawTurn {
  userInput?: string | null;
  agentResponse?: string | null;
  timestamp?: string | null;
}

export interface Page {
  pageId: string;
  userInput: string;
  agentResponse: string;
  timestamp: string;
  preloaded: boolean;
  analyzed: boolean;
  prePage: string | null;
  nextPage: string | null;
  metaInfo: string | null;
  /** Unit-norm when present. */
  embedding?: number[];
  /** Deduplicated, non-empty when present. */
  keywords?: string[];
}

/**
 * The most recently built page, carried from one promotion to the next.
 * Owned by the caller of `MemoryUpdater.processShortTermToMidTerm`.
 */
export type ContinuityCursor = Page | null;

export interface ThemeSummary {
  theme: string;
  content: string;
  keywords: string[];
}

export interface MultiSummaryResult {
  summaries: ThemeSummary[];
}

export interface ProfileAnalysis {
  profile?: string | null;
  private?: string | null;
  assistantKnowledge?: string | null;
}

export interface MidTermSession {
  id: string;
  summary: string;
  keywords: string[];
  embedding?: number[];
  pageIds: string[];
  createdAt: string;
  updatedAt: string;
}

export type KnowledgeOwner = "user" | "assistant";

export interface KnowledgeItem {
  id: string;
  owner: KnowledgeOwner;
  text: string;
  createdAt: string;
}

// ---------------------------------------------------------------------------
// Collaborator contracts
// ---------------------------------------------------------------------------

export interface ShortTermStore {
  isFull(): Promise<boolean>;
  popOldest(): Promise<RawTurn | null>;
}

export interface MidTermStore {
  getPageById(pageId: string): Promise<Page | null>;
  /** Returns the id of the session the pages were placed in. */
  insertPagesIntoSession(
    summary: string,
    keywords: string[],
    pages: Page[],
    similarityThreshold: number,
  ): Promise<string>;
  updatePageConnections(fromPageId: string, toPageId: string): Promise<void>;
  save(): Promise<void>;
}

export interface LongTermStore {
  updateUserProfile(userId: string, text: string, merge: boolean): Promise<void>;
  addUserKnowledge(text: string): Promise<void>;
  addAssistantKnowledge(text: string): Promise<void>;
}

export interface MemoryBackend {
  checkContinuity(prevPage: Page | null, currPage: Page): Promise<boolean>;
  generatePageMetaInfo(prevMetaInfo: string | null, currPage: Page): Promise<string>;
  generateMultiSummary(text: string): Promise<MultiSummaryResult>;
  extractKeywords(text: string): Promise<string[]>;
  getEmbedding(text: string): Promise<number[]>;
}

export interface MemoryConfig {
  openaiApiKey: string | undefined;
  /** Optional OpenAI-compatible base URL (e.g. a proxy). */
  openaiBaseUrl?: string;
  model: string;
  embeddingModel: string;
  memoryDir: string;
  userId: string;
  shortTermCapacity: number;
  topicSimilarityThreshold: number;
  /** Upper bound for any single backend call; 0 disables. */
  collaboratorTimeoutMs: number;
  debug: boolean;
}
