/**
 * Rule: one correction heuristic. A predicate over a failed Command plus a function
 * producing replacement scripts, with the metadata the Corrector filters and ranks by.
 *
 * isMatch and getNewCommand may read the filesystem, PATH or env, but never another
 * rule's state.
 */

import type { Command } from "./command.js";

export const DEFAULT_PRIORITY = 1000;

export interface Rule {
  /** Unique, stable identifier used by enable/exclude lists and priority overrides. */
  readonly name: string;
  /** Lower surfaces earlier. */
  readonly priority: number;
  readonly enabledByDefault: boolean;
  /** When true the rule is never tested against a Command with empty output. */
  readonly requiresOutput: boolean;
  isMatch(command: Command): boolean;
  /** Only called after isMatch returned true. Zero, one or many scripts. */
  getNewCommand(command: Command): string[];
  /** Runs after the chosen script exited 0. */
  sideEffect?(command: Command, script: string): void;
}

export interface RuleSpec {
  name: string;
  priority?: number;
  enabledByDefault?: boolean;
  requiresOutput?: boolean;
  isMatch(command: Command): boolean;
  getNewCommand(command: Command): string[];
  sideEffect?(command: Command, script: string): void;
}

export function defineRule(spec: RuleSpec): Rule {
  const rule: Rule = {
    name: spec.name,
    priority: spec.priority ?? DEFAULT_PRIORITY,
    enabledByDefault: spec.enabledByDefault ?? true,
    requiresOutput: spec.requiresOutput ?? true,
    isMatch: spec.isMatch,
    getNewCommand: spec.getNewCommand,
  };
  if (spec.sideEffect !== undefined) rule.sideEffect = spec.sideEffect;
  return Object.freeze(rule);
}
