/**
 * no_command: the shell could not find the program; suggest the closest executables on PATH.
 */

import type { Command } from "../core/command.js";
import { defineRule } from "../core/rule.js";
import type { Rule } from "../core/rule.js";
import { shellJoin } from "../core/shellSplit.js";
import { getCloseMatches } from "../fuzzy/closeMatches.js";
import { getAllExecutables } from "../util/executables.js";

const NOT_FOUND_PATTERNS = [
  "command not found",
  "not found",
  "not recognized",
  "unknown command",
  "couldn't find",
  "could not find",
  "not an operable program",
];

/** How shells name the missing program, per line. */
const MISSING_PROGRAM = [
  /^([^:\s]+): command not found/,
  /command not found: ([^\s]+)/,
  /'([^']+)' is not recognized/,
  /^([^:\s]+):.*(?:not found|not recognized)/,
];

const SHELL_NAMES = new Set(["bash", "zsh", "fish", "sh", "dash", "powershell", "pwsh", "cmd"]);

/** Program name the shell reported as missing, skipping lines where the shell names itself. */
export function missingProgram(output: string): string | undefined {
  for (const pattern of MISSING_PROGRAM) {
    for (const line of output.split("\n")) {
      const name = pattern.exec(line)?.[1]?.trim();
      if (name !== undefined && name !== "" && !SHELL_NAMES.has(name)) return name;
    }
  }
  return undefined;
}

function reportsNotFound(command: Command): boolean {
  const output = command.output.toLowerCase();
  return NOT_FOUND_PATTERNS.some((pattern) => output.includes(pattern));
}

export interface NoCommandDeps {
  listExecutables?: () => readonly string[];
}

export function createNoCommand(deps: NoCommandDeps = {}): Rule {
  const listExecutables = deps.listExecutables ?? (() => getAllExecutables());

  return defineRule({
    name: "no_command",
    priority: 500,
    isMatch: (command) => command.parts.length > 0 && reportsNotFound(command),
    getNewCommand: (command) => {
      const typed = command.parts[0];
      if (typed === undefined) return [];
      const broken = missingProgram(command.output) ?? typed;
      const rest = command.parts.slice(1);
      const suffix = rest.length > 0 ? ` ${shellJoin(rest)}` : "";
      return getCloseMatches(broken, listExecutables()).map((program) => `${program}${suffix}`);
    },
  });
}
