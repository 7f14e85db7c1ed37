/**
 * cd heuristics: `cd..` spacing, creating a missing directory, and fixing a
 * misspelled directory name against what actually exists.
 */

import { readdirSync } from "fs";
import { isAbsolute, resolve } from "path";
import type { Command } from "../core/command.js";
import { defineRule } from "../core/rule.js";
import type { Rule } from "../core/rule.js";
import { isApp } from "../core/scoped.js";
import { shellJoin, shellQuote } from "../core/shellSplit.js";
import { getCloseMatches } from "../fuzzy/closeMatches.js";
import { andCommands } from "../shells/alias.js";

const MISSING_DIR_PATTERNS = [
  "no such file or directory",
  "not a directory",
  "does not exist",
  "cannot find path",
  "the system cannot find the path",
];

function reportsMissingDirectory(command: Command): boolean {
  const output = command.output.toLowerCase();
  return MISSING_DIR_PATTERNS.some((pattern) => output.includes(pattern));
}

/** `cd..` → `cd ..`. Needs no output: the typo is visible in the script alone. */
export const cdParent = defineRule({
  name: "cd_parent",
  priority: 100,
  requiresOutput: false,
  isMatch: (command) => {
    const script = command.script.trim();
    return script.startsWith("cd.");
  },
  getNewCommand: (command) => [`cd ${command.script.trim().slice("cd".length).trim()}`],
});

export const cdMkdir = defineRule({
  name: "cd_mkdir",
  priority: 200,
  isMatch: (command) => isApp(command, ["cd"]) && reportsMissingDirectory(command),
  getNewCommand: (command) => {
    const target = command.parts.slice(1);
    if (target.length === 0) return [];
    const dir = shellJoin(target);
    return [andCommands(`mkdir -p ${dir}`, `cd ${dir}`)];
  },
});

export function listDirectories(dir: string): string[] {
  try {
    return readdirSync(dir, { withFileTypes: true })
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();
  } catch {
    return [];
  }
}

export interface CdCorrectionDeps {
  cwd?: () => string;
  listDirectories?: (dir: string) => string[];
}

/** `cd projetcs` → `cd projects`, looking in the parent the user named (or the cwd). */
export function createCdCorrection(deps: CdCorrectionDeps = {}): Rule {
  const cwd = deps.cwd ?? (() => process.cwd());
  const list = deps.listDirectories ?? listDirectories;

  return defineRule({
    name: "cd_correction",
    priority: 300,
    isMatch: (command) => command.script.trim().startsWith("cd ") && reportsMissingDirectory(command),
    getNewCommand: (command) => {
      const arg = command.parts[1];
      if (arg === undefined || arg === "") return [];

      const slash = arg.lastIndexOf("/");
      const parent = slash < 0 ? undefined : slash === 0 ? "/" : arg.slice(0, slash);
      const typo = slash < 0 ? arg : arg.slice(slash + 1);
      if (typo === "") return [];

      const searchDir = parent === undefined ? cwd() : isAbsolute(parent) ? parent : resolve(cwd(), parent);
      return getCloseMatches(typo, list(searchDir)).map((name) => {
        const target = parent === undefined ? name : parent === "/" ? `/${name}` : `${parent}/${name}`;
        return `cd ${shellQuote(target)}`;
      });
    },
  });
}
