/**
 * Registry of built-in rules. Rules that read the filesystem or PATH take their
 * lookups from the context so a caller (or a test) can substitute them.
 */

import type { Rule } from "../core/rule.js";
import { getAllExecutables } from "../util/executables.js";
import { cdMkdir, cdParent, createCdCorrection } from "./cd.js";
import { dockerNotCommand } from "./docker.js";
import { createGitCheckout } from "./git/checkout.js";
import { gitCommandTypo, gitNotCommand } from "./git/notCommand.js";
import { gitPush, gitPushPull } from "./git/push.js";
import { createNoCommand } from "./noCommand.js";
import { npmWrongCommand } from "./npm.js";
import { sudo } from "./sudo.js";
import { createPythonCommand, slLs } from "./typo.js";

export interface RuleContext {
  /** PATH entries the executable index skips. */
  excludedSearchPathPrefixes?: readonly string[];
  listExecutables?: () => readonly string[];
  programExists?: (program: string) => boolean;
  listBranches?: () => string[];
  cwd?: () => string;
  listDirectories?: (dir: string) => string[];
}

export function getAllRules(context: RuleContext = {}): Rule[] {
  const excludedPrefixes = context.excludedSearchPathPrefixes ?? [];
  const listExecutables = context.listExecutables ?? (() => getAllExecutables({ excludedPrefixes }));

  return [
    sudo,
    cdParent,
    cdMkdir,
    createCdCorrection({ cwd: context.cwd, listDirectories: context.listDirectories }),
    slLs,
    createPythonCommand({ exists: context.programExists }),
    createNoCommand({ listExecutables }),
    gitNotCommand,
    gitCommandTypo,
    gitPush,
    gitPushPull,
    createGitCheckout({ listBranches: context.listBranches }),
    dockerNotCommand,
    npmWrongCommand,
  ];
}
