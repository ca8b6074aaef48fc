import { z } from "zod";

// ---------------------------------------------------------------------------
// LLM structured outputs
// ---------------------------------------------------------------------------

export const ContinuityJudgmentSchema = z.object({
  continuous: z
    .boolean()
    .describe("True when the current exchange directly continues the previous one"),
});

export const PageMetaInfoSchema = z.object({
  metaInfo: z
    .string()
    .describe(
      "One or two sentences describing the ongoing conversation chain, updated to include the current exchange",
    ),
});

export const ThemeSummarySchema = z.object({
  theme: z.string().describe("Short label for the theme (2-6 words)"),
  content: z.string().describe("A concise summary of what was discussed under this theme"),
  keywords: z.array(z.string()).describe("3-8 keywords characteristic of this theme"),
});

export const MultiSummarySchema = z.object({
  summaries: z
    .array(ThemeSummarySchema)
    .describe("One entry per distinct theme in the conversation; empty if nothing substantive was discussed"),
});

export const KeywordsSchema = z.object({
  keywords: z.array(z.string()).describe("3-10 keywords that capture the main subjects of the text"),
});

// ---------------------------------------------------------------------------
// Persisted store state
// ---------------------------------------------------------------------------

const RawTurnSchema = z.object({
  userInput: z.string().nullable().optional(),
  agentResponse: z.string().nullable().optional(),
  timestamp: z.string().nullable().optional(),
});

export const ShortTermStateSchema = z.object({
  turns: z.array(RawTurnSchema),
});

const PageSchema = z.object({
  pageId: z.string(),
  userInput: z.string(),
  agentResponse: z.string(),
  timestamp: z.string(),
  preloaded: z.boolean().default(false),
  analyzed: z.boolean().default(false),
  prePage: z.string().nullable().default(null),
  nextPage: z.string().nullable().default(null),
  metaInfo: z.string().nullable().default(null),
  embedding: z.array(z.number()).optional(),
  keywords: z.array(z.string()).optional(),
});

const MidTermSessionSchema = z.object({
  id: z.string(),
  summary: z.string(),
  keywords: z.array(z.string()),
  embedding: z.array(z.number()).optional(),
  pageIds: z.array(z.string()),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export const MidTermStateSchema = z.object({
  version: z.literal(1),
  pages: z.array(PageSchema),
  sessions: z.array(MidTermSessionSchema),
});

export type MidTermState = z.infer<typeof MidTermStateSchema>;
