/**
 * CorrectedCommand: one ranked candidate fix, plus the ordering and
 * de-duplication the Corrector applies to the whole candidate list.
 */

import type { Command } from "./command.js";
import type { Rule } from "./rule.js";
import { stringCompareBinary, uniqueBy } from "../util/order.js";

/** Which rule to call back after the chosen script succeeds, and with what Command. */
export interface SideEffectRef {
  readonly rule: Rule;
  readonly command: Command;
}

export interface CorrectedCommand {
  readonly script: string;
  /** Resolved priority: configured override, else the rule's own. */
  readonly priority: number;
  readonly sideEffect?: SideEffectRef;
}

/** Total order: priority ascending, then script by UTF-16 code units. */
export function compareCorrected(a: CorrectedCommand, b: CorrectedCommand): number {
  if (a.priority !== b.priority) return a.priority < b.priority ? -1 : 1;
  return stringCompareBinary(a.script, b.script);
}

export function sortCorrected(items: readonly CorrectedCommand[]): CorrectedCommand[] {
  return [...items].sort(compareCorrected);
}

/** Two candidates are duplicates when their scripts are equal; the first one stays. */
export function dedupeCorrected(items: readonly CorrectedCommand[]): CorrectedCommand[] {
  return uniqueBy(items, (c) => c.script);
}

/**
 * Sort, drop duplicate scripts, then keep at most `limit` entries (no limit when 0 or negative).
 */
export function organizeCorrected(items: readonly CorrectedCommand[], limit = 0): CorrectedCommand[] {
  const unique = dedupeCorrected(sortCorrected(items));
  return limit > 0 ? unique.slice(0, limit) : unique;
}
