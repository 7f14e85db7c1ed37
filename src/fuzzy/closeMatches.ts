/**
 * Nearest-candidate lookups for typo correction (subcommands, branches, executables).
 */

import { similarity } from "./jaroWinkler.js";

export const DEFAULT_MATCH_COUNT = 3;
export const DEFAULT_CUTOFF = 0.6;

interface Scored {
  candidate: string;
  score: number;
}

function rank(word: string, possibilities: readonly string[], cutoff: number): Scored[] {
  const scored: Scored[] = [];
  for (const candidate of possibilities) {
    const score = similarity(word, candidate);
    if (score >= cutoff) scored.push({ candidate, score });
  }
  // Array.prototype.sort is stable: equal scores keep input order.
  return scored.sort((x, y) => y.score - x.score);
}

/**
 * Up to `n` possibilities scoring at least `cutoff`, best first.
 */
export function getCloseMatches(
  word: string,
  possibilities: readonly string[],
  n: number = DEFAULT_MATCH_COUNT,
  cutoff: number = DEFAULT_CUTOFF,
): string[] {
  if (n <= 0) return [];
  return rank(word, possibilities, cutoff)
    .slice(0, n)
    .map((s) => s.candidate);
}

export interface ClosestOptions {
  cutoff?: number;
  /** Return the first possibility when nothing clears the cutoff. Default true. */
  fallbackToFirst?: boolean;
}

export function getClosest(
  word: string,
  possibilities: readonly string[],
  options: ClosestOptions = {},
): string | undefined {
  const cutoff = options.cutoff ?? DEFAULT_CUTOFF;
  const fallbackToFirst = options.fallbackToFirst ?? true;
  const best = rank(word, possibilities, cutoff)[0];
  if (best !== undefined) return best.candidate;
  return fallbackToFirst ? possibilities[0] : undefined;
}
