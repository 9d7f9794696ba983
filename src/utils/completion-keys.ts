// Anonymous completions are stored in sessions as "ch{challengeId}".
// Existing sessions depend on this exact format; do not change it.
const COMPLETION_KEY_PATTERN = /^ch([1-9][0-9]*)$/;

export function formatCompletionKey(challengeId: number): string {
  return `ch${challengeId}`;
}

/**
 * Returns the challenge id embedded in a completion key, or null when the key is
 * malformed ("ch0", "ch01", "ch-1", "1", non-strings, ids past the safe range).
 */
export function parseCompletionKey(key: unknown): number | null {
  if (typeof key !== "string") return null;
  const match = COMPLETION_KEY_PATTERN.exec(key);
  if (!match) return null;
  const id = Number(match[1]);
  return Number.isSafeInteger(id) ? id : null;
}

/** Challenge ids of the well-formed keys, in first-seen order, without repeats. */
export function completionKeysToIds(keys: readonly unknown[]): number[] {
  const ids: number[] = [];
  for (const key of keys) {
    const id = parseCompletionKey(key);
    if (id !== null && !ids.includes(id)) ids.push(id);
  }
  return ids;
}
