/**
 * npm_wrong_command: `npm instal` and friends. npm prints its command list under
 * "where <command> is one of:"; a short built-in list covers outputs without it.
 */

import { defineRule } from "../core/rule.js";
import { forApp } from "../core/scoped.js";
import { getClosest } from "../fuzzy/closeMatches.js";
import { replaceArgument } from "../util/executables.js";

const COMMAND_LIST_HEADING = "where <command> is one of:";

const FALLBACK_COMMANDS = [
  "install",
  "uninstall",
  "update",
  "publish",
  "run",
  "start",
  "test",
  "init",
  "search",
  "list",
  "outdated",
  "audit",
  "cache",
  "config",
  "help",
  "version",
  "view",
  "pack",
  "link",
  "prune",
  "rebuild",
  "dedupe",
];

/** First argument after `npm` that is not a flag. */
function wrongCommand(parts: readonly string[]): string | undefined {
  return parts.slice(1).find((part) => !part.startsWith("-"));
}

/** Comma-separated names in the block after the heading, up to the first blank line. */
export function availableCommands(output: string): string[] {
  const commands: string[] = [];
  let inList = false;
  for (const line of output.split("\n")) {
    if (line.includes(COMMAND_LIST_HEADING)) {
      inList = true;
      continue;
    }
    if (!inList) continue;
    if (line.trim() === "") break;
    for (const name of line.split(",")) {
      const trimmed = name.trim();
      if (trimmed !== "") commands.push(trimmed);
    }
  }
  return commands.length > 0 ? commands : FALLBACK_COMMANDS;
}

export const npmWrongCommand = forApp(
  defineRule({
    name: "npm_wrong_command",
    isMatch: (command) =>
      (command.output.includes("is not a npm command") || command.output.includes(COMMAND_LIST_HEADING)) &&
      wrongCommand(command.parts) !== undefined,
    getNewCommand: (command) => {
      const wrong = wrongCommand(command.parts);
      if (wrong === undefined) return [];
      const fixed = getClosest(wrong, availableCommands(command.output), { fallbackToFirst: false });
      return fixed === undefined ? [] : [replaceArgument(command.script, wrong, fixed)];
    },
  }),
  ["npm"],
);
