/**
 * git push failures: missing upstream, and a remote that is ahead of us.
 */

import { defineRule } from "../../core/rule.js";
import { gitSupport } from "../../core/scoped.js";
import { andCommands } from "../../shells/alias.js";
import { replaceArgument } from "../../util/executables.js";

const SUGGESTED_PUSH = /git push (.*)/g;

/**
 * Drop what the user already passed for the upstream: `-u <remote>` / `--set-upstream <remote>`,
 * or, when neither is present, the positional arguments after `push`.
 */
function withoutUpstreamArgs(words: string[]): string[] {
  const out = [...words];
  const flagAt = out.findIndex((w) => w === "--set-upstream" || w === "-u");
  if (flagAt >= 0) {
    out.splice(flagAt, 2);
    return out;
  }
  const pushAt = out.indexOf("push");
  if (pushAt < 0) return out;
  return out.filter((w, i) => i <= pushAt || w.startsWith("-"));
}

/** `git push` on a branch with no upstream: use the command git printed. */
export const gitPush = gitSupport(
  defineRule({
    name: "git_push",
    isMatch: (command) => command.script.includes("push") && command.output.includes("git push --set-upstream"),
    getNewCommand: (command) => {
      const suggested = [...command.output.matchAll(SUGGESTED_PUSH)].pop()?.[1];
      if (suggested === undefined) return [];
      const args = suggested.replace(/'/g, "\\'").trim();
      const base = withoutUpstreamArgs(command.script.split(/\s+/).filter((w) => w !== "")).join(" ");
      return [replaceArgument(base, "push", `push ${args}`)];
    },
  }),
);

const BEHIND_REMOTE = [
  "Updates were rejected because the tip of your current branch is behind",
  "Updates were rejected because the remote contains work that you do",
];

/** Rejected non-fast-forward push: pull first, then push again. */
export const gitPushPull = gitSupport(
  defineRule({
    name: "git_push_pull",
    isMatch: (command) =>
      command.script.includes("push") &&
      command.output.includes("! [rejected]") &&
      command.output.includes("failed to push some refs to") &&
      BEHIND_REMOTE.some((reason) => command.output.includes(reason)),
    getNewCommand: (command) => [andCommands(replaceArgument(command.script, "push", "pull"), command.script)],
  }),
);
