/**
 * Pull a JSON payload out of free-form model output.
 *
 * Models that ignore structured-output settings tend to wrap JSON in
 * ```json fences, prefix it with prose, or emit a sample object before the
 * real one. Candidates are returned in the order they should be tried;
 * callers validate each against a schema and keep the first that passes.
 */

export interface SafeParser<T> {
  safeParse(data: unknown): { success: true; data: T } | { success: false };
}

export function stripCodeFences(text: string): string {
  return text.replace(/```(?:json)?\s*([\s\S]*?)```/gi, (_m, inner: string) => inner.trim());
}

export function extractJsonCandidates(text: string): string[] {
  const cleaned = stripCodeFences(text.trim());
  const ordered = [cleaned, ...balancedBlocks(cleaned)];
  const seen = new Set<string>();
  const out: string[] = [];
  for (const candidate of ordered) {
    const c = candidate.trim();
    if (c.length === 0 || seen.has(c)) continue;
    seen.add(c);
    out.push(c);
  }
  return out;
}

/** First candidate that is valid JSON and satisfies `schema`, else null. */
export function parseJsonWithSchema<T>(text: string, schema: SafeParser<T>): T | null {
  for (const candidate of extractJsonCandidates(text)) {
    let value: unknown;
    try {
      value = JSON.parse(candidate);
    } catch {
      continue;
    }
    const result = schema.safeParse(value);
    if (result.success) return result.data;
  }
  return null;
}

// Top-level {...} / [...] spans, string-aware so braces inside quoted text
// do not unbalance the scan.
function balancedBlocks(text: string): string[] {
  const blocks: string[] = [];
  let i = 0;
  while (i < text.length) {
    const open = text[i];
    if (open !== "{" && open !== "[") {
      i++;
      continue;
    }
    const end = matchingClose(text, i);
    if (end === -1) {
      i++;
      continue;
    }
    blocks.push(text.slice(i, end + 1));
    i = end + 1;
  }
  return blocks;
}

function matchingClose(text: string, start: number): number {
  const stack: string[] = [];
  let inString = false;
  let escaped = false;
  for (let j = start; j < text.length; j++) {
    const ch = text[j];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === "\"") inString = false;
      continue;
    }
    if (ch === "\"") {
      inString = true;
    } else if (ch === "{" || ch === "[") {
      stack.push(ch === "{" ? "}" : "]");
    } else if (ch === "}" || ch === "]") {
      if (stack.pop() !== ch) return -1;
      if (stack.length === 0) return j;
    }
  }
  return -1;
}
