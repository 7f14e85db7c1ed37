/**
 * `git: 'stauts' is not a git command.` Two variants: git listed its own suggestions,
 * or it did not and we fall back to a list of common subcommands.
 */

import type { Command } from "../../core/command.js";
import { defineRule } from "../../core/rule.js";
import { gitSupport } from "../../core/scoped.js";
import { getAllMatchedCommands, replaceCommand } from "../../util/executables.js";

const NOT_A_COMMAND = /git: '([^']*)' is not a git command/;
const SUGGESTION_HEADINGS = ["The most similar command", "Did you mean"];

const COMMON_SUBCOMMANDS = [
  "add",
  "bisect",
  "branch",
  "checkout",
  "cherry-pick",
  "clone",
  "commit",
  "config",
  "diff",
  "fetch",
  "grep",
  "init",
  "log",
  "merge",
  "mv",
  "pull",
  "push",
  "rebase",
  "remote",
  "reset",
  "restore",
  "revert",
  "rm",
  "show",
  "stash",
  "status",
  "switch",
  "tag",
  "worktree",
];

function brokenSubcommand(command: Command): string | undefined {
  const broken = NOT_A_COMMAND.exec(command.output)?.[1];
  return broken === undefined || broken === "" ? undefined : broken;
}

function listsSuggestions(command: Command): boolean {
  return SUGGESTION_HEADINGS.some((heading) => command.output.includes(heading));
}

export const gitNotCommand = gitSupport(
  defineRule({
    name: "git_not_command",
    isMatch: (command) =>
      command.output.includes(" is not a git command. See 'git --help'.") && listsSuggestions(command),
    getNewCommand: (command) => {
      const broken = brokenSubcommand(command);
      if (broken === undefined) return [];
      return replaceCommand(command.script, broken, getAllMatchedCommands(command.output, SUGGESTION_HEADINGS));
    },
  }),
);

export const gitCommandTypo = gitSupport(
  defineRule({
    name: "git_command_typo",
    priority: 1100,
    isMatch: (command) => command.output.includes(" is not a git command") && !listsSuggestions(command),
    getNewCommand: (command) => {
      const broken = brokenSubcommand(command);
      if (broken === undefined) return [];
      return replaceCommand(command.script, broken, COMMON_SUBCOMMANDS);
    },
  }),
);
