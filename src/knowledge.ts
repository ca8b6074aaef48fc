import { log } from "./logger.js";
import type { LongTermStore, ProfileAnalysis } from "./types.js";

export interface KnowledgePromotionResult {
  profileUpdated: boolean;
  userKnowledgeAdded: number;
  assistantKnowledgeAdded: number;
}

const BULLET = /^[-*•]\s*/;
const NONE_LINE = /^(?:[-*•]\s*)?none\.?$/i;

/** Profile text worth storing: not blank and not the model's "none". */
export function isMeaningfulProfile(text: string | null | undefined): text is string {
  if (!text) return false;
  const trimmed = text.trim();
  return trimmed.length > 0 && trimmed.toLowerCase() !== "none";
}

/**
 * One knowledge item per line. Blank lines and "none" markers
 * ("none", "- none", "- None.") are dropped; a leading bullet is removed.
 */
export function knowledgeLines(text: string | null | undefined): string[] {
  if (!text) return [];
  const out: string[] = [];
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (line.length === 0 || NONE_LINE.test(line)) continue;
    const item = line.replace(BULLET, "").trim();
    if (item.length > 0) out.push(item);
  }
  return out;
}

/** Folds a profile/knowledge analysis into the long-term store. */
export class KnowledgePromoter {
  constructor(private readonly longTerm: LongTermStore) {}

  async promote(userId: string, analysis: ProfileAnalysis | null | undefined): Promise<KnowledgePromotionResult> {
    const result: KnowledgePromotionResult = {
      profileUpdated: false,
      userKnowledgeAdded: 0,
      assistantKnowledgeAdded: 0,
    };
    if (!analysis || Object.keys(analysis).length === 0) {
      log.debug("knowledge promotion skipped: empty analysis");
      return result;
    }

    if (isMeaningfulProfile(analysis.profile)) {
      await this.longTerm.updateUserProfile(userId, analysis.profile.trim(), false);
      result.profileUpdated = true;
    }

    for (const line of knowledgeLines(analysis.private)) {
      await this.longTerm.addUserKnowledge(line);
      result.userKnowledgeAdded++;
    }

    for (const line of knowledgeLines(analysis.assistantKnowledge)) {
      await this.longTerm.addAssistantKnowledge(line);
      result.assistantKnowledgeAdded++;
    }

    log.info(
      `long-term update for ${userId}: profile=${result.profileUpdated}, userKnowledge=${result.userKnowledgeAdded}, assistantKnowledge=${result.assistantKnowledgeAdded}`,
    );
    return result;
  }
}
