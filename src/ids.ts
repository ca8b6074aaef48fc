let sequence = 0;

/**
 * `<prefix>-<base36 time>-<base36 sequence>-<random>`. The per-process
 * sequence keeps ids unique even when many are minted in the same
 * millisecond.
 */
export function generateId(prefix: string): string {
  sequence = (sequence + 1) % Number.MAX_SAFE_INTEGER;
  const ts = Date.now().toString(36);
  const rand = Math.random().toString(36).slice(2, 6);
  return `${prefix}-${ts}-${sequence.toString(36)}-${rand}`;
}

export function nowIso(): string {
  return new Date().toISOString();
}
