/**
 * Jaro-Winkler similarity over Unicode code points. 1 means identical, 0 means nothing in common.
 */

const WINKLER_PREFIX_LIMIT = 4;
const WINKLER_SCALING = 0.1;
const WINKLER_THRESHOLD = 0.7;

export function jaro(a: string, b: string): number {
  const s1 = Array.from(a);
  const s2 = Array.from(b);
  if (s1.length === 0 && s2.length === 0) return 1;
  if (s1.length === 0 || s2.length === 0) return 0;

  const window = Math.max(0, Math.floor(Math.max(s1.length, s2.length) / 2) - 1);
  const matched1 = new Array<boolean>(s1.length).fill(false);
  const matched2 = new Array<boolean>(s2.length).fill(false);

  let matches = 0;
  for (let i = 0; i < s1.length; i++) {
    const lo = Math.max(0, i - window);
    const hi = Math.min(s2.length - 1, i + window);
    for (let j = lo; j <= hi; j++) {
      if (matched2[j] || s1[i] !== s2[j]) continue;
      matched1[i] = true;
      matched2[j] = true;
      matches++;
      break;
    }
  }
  if (matches === 0) return 0;

  let halfTranspositions = 0;
  let k = 0;
  for (let i = 0; i < s1.length; i++) {
    if (!matched1[i]) continue;
    while (!matched2[k]) k++;
    if (s1[i] !== s2[k]) halfTranspositions++;
    k++;
  }
  const transpositions = halfTranspositions / 2;

  return (matches / s1.length + matches / s2.length + (matches - transpositions) / matches) / 3;
}

export function jaroWinkler(a: string, b: string): number {
  const score = jaro(a, b);
  if (score <= WINKLER_THRESHOLD) return score;

  const s1 = Array.from(a);
  const s2 = Array.from(b);
  let prefix = 0;
  const limit = Math.min(WINKLER_PREFIX_LIMIT, s1.length, s2.length);
  while (prefix < limit && s1[prefix] === s2[prefix]) prefix++;

  return score + WINKLER_SCALING * prefix * (1 - score);
}

/** Normalized similarity used by every fuzzy lookup. */
export const similarity = jaroWinkler;
