import OpenAI from "openai";
import { zodTextFormat } from "openai/helpers/zod";
import { z } from "zod";
import { log } from "./logger.js";
import { CollaboratorError, describeError, type BackendOperation } from "./errors.js";
import { parseJsonWithSchema } from "./json-extract.js";
import {
  ContinuityJudgmentSchema,
  KeywordsSchema,
  MultiSummarySchema,
  PageMetaInfoSchema,
} from "./schemas.js";
import type { MemoryBackend, MemoryConfig, MultiSummaryResult, Page } from "./types.js";

const EMBEDDING_INPUT_LIMIT = 8000;

export interface StructuredRequest<T> {
  /** Schema name sent to the provider (snake_case). */
  name: string;
  instructions: string;
  input: string;
  schema: z.ZodType<T>;
}

/** The two model capabilities the memory backend needs. */
export interface StructuredLlm {
  /** Resolves to null when the model produced nothing that validates. */
  parse<T>(request: StructuredRequest<T>): Promise<T | null>;
  embed(text: string): Promise<number[]>;
}

function formatExchange(page: Page): string {
  return `User: ${page.userInput}\nAssistant: ${page.agentResponse}`;
}

export function dedupeKeywords(keywords: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const raw of keywords) {
    const k = raw.trim();
    if (k.length === 0 || seen.has(k)) continue;
    seen.add(k);
    out.push(k);
  }
  return out;
}

/**
 * Prompts and post-processing for every model judgment the promotion
 * pipeline delegates. A model call that yields nothing usable is a
 * CollaboratorError; the caller decides whether that is fatal.
 */
export class LlmMemoryBackend implements MemoryBackend {
  constructor(private readonly llm: StructuredLlm) {}

  private async ask<T>(operation: BackendOperation, request: StructuredRequest<T>): Promise<T> {
    let result: T | null;
    try {
      result = await this.llm.parse(request);
    } catch (err) {
      throw new CollaboratorError(operation, describeError(err), { cause: err });
    }
    if (result === null) {
      throw new CollaboratorError(operation, "model returned no parseable output");
    }
    return result;
  }

  async checkContinuity(prevPage: Page | null, currPage: Page): Promise<boolean> {
    if (!prevPage) return false;

    const judgment = await this.ask("checkContinuity", {
      name: "continuity_judgment",
      schema: ContinuityJudgmentSchema,
      instructions: `You decide whether two consecutive exchanges between a user and an assistant belong to the same ongoing conversation thread.

Answer continuous=true only when the current exchange follows on from the previous one: it refers back to it, answers or extends it, or stays on the same concrete subject. A change of topic, a greeting that starts over, or an unrelated request means continuous=false.`,
      input: `Previous exchange:
${formatExchange(prevPage)}

Current exchange:
${formatExchange(currPage)}`,
    });
    log.debug(`continuity ${prevPage.pageId} -> ${currPage.pageId}: ${judgment.continuous}`);
    return judgment.continuous;
  }

  async generatePageMetaInfo(prevMetaInfo: string | null, currPage: Page): Promise<string> {
    const context = prevMetaInfo?.trim()
      ? `Description of the conversation so far:\n${prevMetaInfo.trim()}`
      : "This exchange starts a new conversation thread.";

    const out = await this.ask("generatePageMetaInfo", {
      name: "page_meta_info",
      schema: PageMetaInfoSchema,
      instructions: `You maintain a running description of a conversation thread between a user and an assistant.

Write one or two sentences that describe the whole thread including the latest exchange: the subject, what the user is after, and where the discussion stands. Keep facts from the existing description unless the latest exchange supersedes them. Do not quote the exchange.`,
      input: `${context}

Latest exchange:
${formatExchange(currPage)}`,
    });

    const metaInfo = out.metaInfo.trim();
    if (metaInfo.length === 0) {
      throw new CollaboratorError("generatePageMetaInfo", "model returned an empty description");
    }
    return metaInfo;
  }

  async generateMultiSummary(text: string): Promise<MultiSummaryResult> {
    const out = await this.ask("generateMultiSummary", {
      name: "multi_summary",
      schema: MultiSummarySchema,
      instructions: `You segment a conversation transcript into themes.

Group the exchanges by subject. For each distinct theme give a short label, a concise summary of what was said, and the keywords that best characterise it. Use as few themes as the material allows; small talk with no substance gets no theme at all.`,
      input: text,
    });

    return {
      summaries: out.summaries.map((s) => ({
        theme: s.theme.trim(),
        content: s.content.trim(),
        keywords: dedupeKeywords(s.keywords),
      })),
    };
  }

  async extractKeywords(text: string): Promise<string[]> {
    const out = await this.ask("extractKeywords", {
      name: "keywords",
      schema: KeywordsSchema,
      instructions:
        "Extract the keywords that capture the main subjects of the text. Prefer specific nouns and noun phrases over generic words.",
      input: text,
    });
    return dedupeKeywords(out.keywords);
  }

  async getEmbedding(text: string): Promise<number[]> {
    let vector: number[];
    try {
      vector = await this.llm.embed(text);
    } catch (err) {
      throw new CollaboratorError("getEmbedding", describeError(err), { cause: err });
    }
    if (vector.length === 0) {
      throw new CollaboratorError("getEmbedding", "provider returned an empty vector");
    }
    return vector;
  }
}

/** StructuredLlm over the OpenAI Responses and Embeddings APIs. */
export class OpenAiStructuredLlm implements StructuredLlm {
  private readonly client: OpenAI;

  constructor(private readonly config: MemoryConfig) {
    if (!config.openaiApiKey) {
      throw new Error("openaiApiKey is required for the OpenAI backend (set OPENAI_API_KEY)");
    }
    this.client = new OpenAI({
      apiKey: config.openaiApiKey,
      ...(config.openaiBaseUrl ? { baseURL: config.openaiBaseUrl } : {}),
      ...(config.collaboratorTimeoutMs > 0 ? { timeout: config.collaboratorTimeoutMs } : {}),
    });
  }

  async parse<T>(request: StructuredRequest<T>): Promise<T | null> {
    const startedAt = Date.now();
    const { parsed, text } = await this.respond(request.name, {
      model: this.config.model,
      instructions: request.instructions,
      input: request.input,
      text: { format: zodTextFormat(request.schema, request.name) },
    });
    log.debug(`${request.name}: model=${this.config.model} durationMs=${Date.now() - startedAt}`);

    if (parsed !== null && parsed !== undefined) {
      const checked = request.schema.safeParse(parsed);
      if (checked.success) return checked.data;
    }

    // Some OpenAI-compatible servers ignore text.format and answer in prose.
    const recovered = parseJsonWithSchema(text, request.schema);
    if (recovered === null) {
      log.warn(`${request.name}: no parseable output from ${this.config.model}`);
    }
    return recovered;
  }

  /**
   * responses.parse runs JSON.parse and the schema over the output text and
   * throws when it is not bare JSON; the request is then repeated through
   * responses.create to get the raw text.
   */
  private async respond(
    name: string,
    params: OpenAI.Responses.ResponseCreateParamsNonStreaming,
  ): Promise<{ parsed: unknown; text: string }> {
    try {
      const response = await this.client.responses.parse(params);
      return { parsed: response.output_parsed, text: response.output_text };
    } catch (err) {
      if (!(err instanceof SyntaxError || err instanceof z.ZodError)) throw err;
      log.debug(`${name}: structured output rejected (${describeError(err)}); requesting raw text`);
      const response = await this.client.responses.create(params);
      return { parsed: null, text: response.output_text };
    }
  }

  async embed(text: string): Promise<number[]> {
    const response = await this.client.embeddings.create({
      model: this.config.embeddingModel,
      input: text.slice(0, EMBEDDING_INPUT_LIMIT),
      encoding_format: "float",
    });
    return response.data[0]?.embedding ?? [];
  }
}
