/**
 * PATH executable index and the argument-rewriting helpers rules build on.
 * The index is the only cached module state; entries are keyed by their inputs.
 */

import { readdirSync, statSync } from "fs";
import { delimiter, join } from "path";
import { getCloseMatches } from "../fuzzy/closeMatches.js";
import { createLogger } from "../log/logger.js";
import { escapeRegExp } from "./regex.js";

const log = createLogger("executables");

/** Names of this tool; never offered as a correction target. */
const OWN_NAMES = new Set(["whoops", "whoops.exe"]);

export interface ExecutableQuery {
  /** PATH value to scan. Defaults to process.env.PATH. */
  path?: string;
  excludedPrefixes?: readonly string[];
}

const executablesCache = new Map<string, readonly string[]>();
const whichCache = new Map<string, string | undefined>();

function isExecutableFile(file: string): boolean {
  try {
    const st = statSync(file);
    if (!st.isFile()) return false;
    if (process.platform === "win32") return true;
    return (st.mode & 0o111) !== 0;
  } catch {
    return false;
  }
}

function pathEntries(path: string): string[] {
  return path.split(delimiter).filter((dir) => dir !== "");
}

/**
 * File names with an execute bit across all PATH directories, first occurrence wins.
 */
export function getAllExecutables(query: ExecutableQuery = {}): readonly string[] {
  const path = query.path ?? process.env.PATH ?? "";
  const excluded = query.excludedPrefixes ?? [];
  const key = `${path}\u0000${excluded.join("\u0000")}`;
  const cached = executablesCache.get(key);
  if (cached !== undefined) return cached;

  const seen = new Set<string>();
  const names: string[] = [];
  for (const dir of pathEntries(path)) {
    if (excluded.some((prefix) => dir.startsWith(prefix))) continue;
    let entries: string[];
    try {
      entries = readdirSync(dir);
    } catch (err) {
      log.debug(`skipping unreadable PATH entry ${dir}`, err);
      continue;
    }
    for (const name of entries.sort()) {
      if (OWN_NAMES.has(name) || seen.has(name)) continue;
      if (!isExecutableFile(join(dir, name))) continue;
      seen.add(name);
      names.push(name);
    }
  }

  const frozen = Object.freeze(names);
  executablesCache.set(key, frozen);
  return frozen;
}

/** Absolute path of the first executable named `program` on PATH. */
export function which(program: string, path: string = process.env.PATH ?? ""): string | undefined {
  const key = `${program}\u0000${path}`;
  if (whichCache.has(key)) return whichCache.get(key);

  let found: string | undefined;
  if (program.includes("/") || program.includes("\\")) {
    found = isExecutableFile(program) ? program : undefined;
  } else {
    for (const dir of pathEntries(path)) {
      const candidate = join(dir, program);
      if (isExecutableFile(candidate)) {
        found = candidate;
        break;
      }
    }
  }
  whichCache.set(key, found);
  return found;
}

export function clearExecutablesCache(): void {
  executablesCache.clear();
  whichCache.clear();
}

/**
 * Replace one whole argument. Tries the last argument, then a middle one, then the first word.
 * Returns the script unchanged when `from` is not a separate argument.
 */
export function replaceArgument(script: string, from: string, to: string): string {
  const escaped = escapeRegExp(from);

  const atEnd = script.replace(new RegExp(` ${escaped}$`), () => ` ${to}`);
  if (atEnd !== script) return atEnd;

  const inMiddle = script.replace(new RegExp(` ${escaped} `), () => ` ${to} `);
  if (inMiddle !== script) return inMiddle;

  return script.replace(new RegExp(`^${escaped} `), () => `${to} `);
}

/** One rewritten script per close match of `broken` among `matched`. */
export function replaceCommand(script: string, broken: string, matched: readonly string[]): string[] {
  return getCloseMatches(broken, matched, 3, 0.1).map((candidate) =>
    replaceArgument(script, broken, candidate.trim()),
  );
}

/**
 * Suggestions a tool lists under a heading such as "Did you mean": every trimmed,
 * non-empty line after the first line that contains one of `separators`.
 */
export function getAllMatchedCommands(output: string, separators: readonly string[]): string[] {
  const result: string[] = [];
  let collecting = false;
  for (const line of output.split("\n")) {
    if (separators.some((sep) => line.includes(sep))) {
      collecting = true;
    } else if (collecting && line.trim() !== "") {
      result.push(line.trim());
    }
  }
  return result;
}
