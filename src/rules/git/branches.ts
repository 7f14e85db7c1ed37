import { spawnSync } from "child_process";

/**
 * Parse `git branch -a --no-color --no-column` output into branch names.
 * Drops the current-branch marker, symbolic refs (`->`) and the `remotes/<remote>/` prefix.
 */
export function parseBranchList(stdout: string): string[] {
  const names: string[] = [];
  for (const raw of stdout.split("\n")) {
    if (raw.includes("->")) continue;
    let line = raw.trim();
    if (line.startsWith("*")) line = line.slice(1).trim();
    if (line.startsWith("remotes/")) line = line.split("/").slice(2).join("/");
    if (line !== "" && !names.includes(line)) names.push(line);
  }
  return names;
}

/** Local and remote branches of the repository in the cwd; [] outside a repository. */
export function getBranches(): string[] {
  try {
    const out = spawnSync("git", ["branch", "-a", "--no-color", "--no-column"], {
      encoding: "utf8",
      maxBuffer: 1024 * 1024,
    });
    if (out.status !== 0 || !out.stdout) return [];
    return parseBranchList(out.stdout);
  } catch {
    return [];
  }
}
