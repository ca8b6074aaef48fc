/**
 * Scale `vector` to unit L2 length. Returns null for empty, zero-length or
 * non-finite input, which cannot be normalised.
 */
export function normalizeVector(vector: readonly number[]): number[] | null {
  if (vector.length === 0) return null;
  let sumSq = 0;
  for (const v of vector) {
    if (!Number.isFinite(v)) return null;
    sumSq += v * v;
  }
  const norm = Math.sqrt(sumSq);
  if (norm === 0 || !Number.isFinite(norm)) return null;
  return vector.map((v) => v / norm);
}

export function l2Norm(vector: readonly number[]): number {
  let sumSq = 0;
  for (const v of vector) sumSq += v * v;
  return Math.sqrt(sumSq);
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const n = Math.min(a.length, b.length);
  if (n === 0) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < n; i++) {
    const av = a[i] ?? 0;
    const bv = b[i] ?? 0;
    dot += av * bv;
    normA += av * av;
    normB += bv * bv;
  }
  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  if (denom === 0) return 0;
  return dot / denom;
}

/** |A ∩ B| / |A ∪ B| over lower-cased keywords; 0 when both are empty. */
export function keywordJaccard(a: readonly string[], b: readonly string[]): number {
  const left = new Set(a.map((k) => k.toLowerCase()));
  const right = new Set(b.map((k) => k.toLowerCase()));
  if (left.size === 0 && right.size === 0) return 0;
  let shared = 0;
  for (const k of left) {
    if (right.has(k)) shared++;
  }
  return shared / (left.size + right.size - shared);
}
