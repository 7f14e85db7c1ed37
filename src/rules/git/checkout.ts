/**
 * git_checkout: `error: pathspec 'featur' did not match any file(s) known to git`.
 * Suggest the closest existing branch, and creating the branch.
 */

import { defineRule } from "../../core/rule.js";
import type { Rule } from "../../core/rule.js";
import { gitSupport } from "../../core/scoped.js";
import { getClosest } from "../../fuzzy/closeMatches.js";
import { andCommands } from "../../shells/alias.js";
import { replaceArgument } from "../../util/executables.js";
import { getBranches } from "./branches.js";

const MISSING_PATHSPEC = /error: pathspec '([^']*)' did not match any file\(s\) known to git/;

export interface GitCheckoutDeps {
  listBranches?: () => string[];
}

export function createGitCheckout(deps: GitCheckoutDeps = {}): Rule {
  const listBranches = deps.listBranches ?? getBranches;

  return gitSupport(
    defineRule({
      name: "git_checkout",
      isMatch: (command) =>
        command.output.includes("did not match any file(s) known to git") &&
        !command.output.includes("Did you forget to 'git add'?"),
      getNewCommand: (command) => {
        const missing = MISSING_PATHSPEC.exec(command.output)?.[1];
        if (missing === undefined || missing === "") return [];

        const scripts: string[] = [];
        const closest = getClosest(missing, listBranches(), { fallbackToFirst: false });
        if (closest !== undefined) scripts.push(replaceArgument(command.script, missing, closest));

        if (command.parts[1] === "checkout") {
          scripts.push(replaceArgument(command.script, "checkout", "checkout -b"));
        }
        if (scripts.length === 0) {
          scripts.push(andCommands(`git branch ${missing}`, command.script));
        }
        return scripts;
      },
    }),
  );
}
