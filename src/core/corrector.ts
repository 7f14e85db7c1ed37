/**
 * Corrector: runs every enabled rule against a failed Command and returns the
 * ranked, de-duplicated, truncated list of candidate fixes.
 *
 * Output order depends only on (command, settings, rule set): rules are evaluated in
 * any order and the final sort alone decides the ranking.
 */

import type { Command } from "./command.js";
import type { CorrectedCommand } from "./corrected.js";
import { organizeCorrected } from "./corrected.js";
import { errorMessage } from "./errors.js";
import type { Rule } from "./rule.js";
import type { Settings } from "../config/settings.js";
import { getRulePriority, isRuleEnabled } from "../config/settings.js";
import { createLogger } from "../log/logger.js";
import { getAllRules } from "../rules/index.js";

const log = createLogger("corrector");

/**
 * Candidates from one rule, no-op scripts removed. A rule that throws counts as not matching.
 */
function correctionsFrom(rule: Rule, command: Command, priority: number): CorrectedCommand[] {
  let scripts: string[];
  try {
    if (!rule.isMatch(command)) return [];
    scripts = rule.getNewCommand(command);
  } catch (err) {
    log.warn(`rule ${rule.name} failed: ${errorMessage(err)}`);
    return [];
  }

  const out: CorrectedCommand[] = [];
  for (const script of scripts) {
    if (script === command.script) continue;
    out.push(
      rule.sideEffect !== undefined
        ? { script, priority, sideEffect: { rule, command } }
        : { script, priority },
    );
  }
  if (out.length > 0) log.debug(`rule ${rule.name} matched`, out.map((c) => c.script));
  return out;
}

export function getCorrectedCommands(
  command: Command,
  settings: Settings,
  rules: readonly Rule[] = getAllRules({ excludedSearchPathPrefixes: settings.excludedSearchPathPrefixes }),
): CorrectedCommand[] {
  const hasOutput = command.output !== "";
  const candidates: CorrectedCommand[] = [];

  for (const rule of rules) {
    if (!isRuleEnabled(settings, rule)) continue;
    if (rule.requiresOutput && !hasOutput) continue;
    candidates.push(...correctionsFrom(rule, command, getRulePriority(settings, rule)));
  }

  return organizeCorrected(candidates, settings.numCloseMatches);
}

export function getBestCorrection(
  command: Command,
  settings: Settings,
  rules: readonly Rule[] = getAllRules({ excludedSearchPathPrefixes: settings.excludedSearchPathPrefixes }),
): CorrectedCommand | undefined {
  return getCorrectedCommands(command, settings, rules)[0];
}

/**
 * Run one rule by name, ignoring enable/exclude lists and requiresOutput.
 * Uses the rule's own priority and does not truncate. Unknown names yield [].
 */
export function matchRule(
  command: Command,
  ruleName: string,
  rules: readonly Rule[] = getAllRules(),
): CorrectedCommand[] {
  const rule = rules.find((r) => r.name === ruleName);
  if (rule === undefined) {
    log.debug(`no rule named ${ruleName}`);
    return [];
  }
  return organizeCorrected(correctionsFrom(rule, command, rule.priority));
}
