/**
 * Well-known program-name typos.
 */

import type { Command } from "../core/command.js";
import { defineRule } from "../core/rule.js";
import type { Rule } from "../core/rule.js";
import { shellJoin } from "../core/shellSplit.js";
import { which } from "../util/executables.js";

const NOT_FOUND_PATTERNS = ["command not found", "not recognized", "not found", "unknown command"];

function reportsNotFound(command: Command): boolean {
  const output = command.output.toLowerCase();
  return NOT_FOUND_PATTERNS.some((pattern) => output.includes(pattern));
}

/** Arguments after the program name, re-quoted, with a leading space; empty when there are none. */
function restOf(command: Command): string {
  const rest = command.parts.slice(1);
  return rest.length > 0 ? ` ${shellJoin(rest)}` : "";
}

export const slLs = defineRule({
  name: "sl_ls",
  priority: 100,
  isMatch: (command) => command.parts[0] === "sl" && reportsNotFound(command),
  getNewCommand: (command) => [`ls${restOf(command)}`],
});

/** Interpreter/installer names to try, in order, when the typed one is missing. */
const PYTHON_ALTERNATIVES: Readonly<Record<string, readonly string[]>> = {
  python: ["python3", "python2"],
  python3: ["python"],
  python2: ["python3", "python"],
  pip: ["pip3", "pip2"],
  pip3: ["pip"],
  pip2: ["pip3", "pip"],
};

export interface PythonCommandDeps {
  exists?: (program: string) => boolean;
}

export function createPythonCommand(deps: PythonCommandDeps = {}): Rule {
  const exists = deps.exists ?? ((program: string) => which(program) !== undefined);

  return defineRule({
    name: "python_command",
    priority: 150,
    isMatch: (command) => {
      const first = command.parts[0] ?? "";
      if (!Object.hasOwn(PYTHON_ALTERNATIVES, first)) return false;
      return reportsNotFound(command) || command.output.toLowerCase().includes("no such file or directory");
    },
    getNewCommand: (command) => {
      const alternatives = PYTHON_ALTERNATIVES[command.parts[0] ?? ""] ?? [];
      const rest = restOf(command);
      return alternatives.filter((program) => exists(program)).map((program) => `${program}${rest}`);
    },
  });
}
