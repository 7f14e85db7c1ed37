/**
 * Canonical ordering: binary UTF-16 code unit ascending only.
 * Never localeCompare: suggestion order must not depend on the user's locale.
 */

/** Binary string comparison (UTF-16 code unit ascending). Returns -1 | 0 | 1. */
export function stringCompareBinary(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Keep the first occurrence of each key, preserve order. */
export function uniqueBy<T>(items: readonly T[], key: (item: T) => string): T[] {
  const seen = new Set<string>();
  const out: T[] = [];
  for (const item of items) {
    const k = key(item);
    if (seen.has(k)) continue;
    seen.add(k);
    out.push(item);
  }
  return out;
}
