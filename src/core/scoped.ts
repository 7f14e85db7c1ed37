/**
 * Rule decorators that add a "only for these programs" precondition, optionally
 * normalizing the Command first. The wrapped rule is never modified.
 */

import type { Command } from "./command.js";
import type { Rule } from "./rule.js";
import { escapeRegExp } from "../util/regex.js";

/** Basename of the first word, without a trailing `.exe`. Empty for an empty script. */
export function appName(command: Command): string {
  const first = command.parts[0];
  if (first === undefined) return "";
  const base = first.slice(Math.max(first.lastIndexOf("/"), first.lastIndexOf("\\")) + 1);
  return base.endsWith(".exe") ? base.slice(0, -".exe".length) : base;
}

export function isApp(command: Command, apps: readonly string[]): boolean {
  const name = appName(command);
  return name !== "" && apps.includes(name);
}

function delegate(inner: Rule, overrides: Pick<Rule, "isMatch" | "getNewCommand">): Rule {
  const wrapped: Rule = {
    name: inner.name,
    priority: inner.priority,
    enabledByDefault: inner.enabledByDefault,
    requiresOutput: inner.requiresOutput,
    isMatch: overrides.isMatch,
    getNewCommand: overrides.getNewCommand,
  };
  const sideEffect = inner.sideEffect;
  if (sideEffect !== undefined) {
    wrapped.sideEffect = (command, script) => sideEffect.call(inner, command, script);
  }
  return Object.freeze(wrapped);
}

/** Matches only when the Command runs one of `apps` and the inner rule matches. */
export function forApp(inner: Rule, apps: readonly string[]): Rule {
  return delegate(inner, {
    isMatch: (command) => isApp(command, apps) && inner.isMatch(command),
    getNewCommand: (command) => inner.getNewCommand(command),
  });
}

export interface Ecosystem {
  apps: readonly string[];
  /** Rewrites the Command into its canonical form before the inner rule sees it. */
  normalize(command: Command): Command;
}

/**
 * Like forApp, but the inner rule sees the normalized Command. sideEffect still
 * receives the Command as the user typed it.
 */
export function forEcosystem(inner: Rule, ecosystem: Ecosystem): Rule {
  return delegate(inner, {
    isMatch: (command) => isApp(command, ecosystem.apps) && inner.isMatch(ecosystem.normalize(command)),
    getNewCommand: (command) => inner.getNewCommand(ecosystem.normalize(command)),
  });
}

const ALIAS_TRACE = /trace: alias expansion: ([^ ]*) => ([^\n]*)/;

/**
 * Rewrite a git alias into what it expanded to, using the GIT_TRACE line in the output:
 *
 *   trace: alias expansion: co => 'checkout'
 *
 * Returns the same Command when there is no trace line.
 */
export function expandGitAlias(command: Command): Command {
  const match = ALIAS_TRACE.exec(command.output);
  if (match === null) return command;
  const alias = match[1] ?? "";
  if (alias === "") return command;

  const expansion = (match[2] ?? "")
    .split(/\s+/)
    .filter((word) => word !== "")
    .map((word) => word.replace(/^'+|'+$/g, ""))
    .join(" ");

  const script = command.script.replace(new RegExp(`\\b${escapeRegExp(alias)}\\b`), () => expansion);
  return command.withScript(script);
}

export const GIT_APPS: readonly string[] = ["git", "hub"];

export function gitSupport(inner: Rule): Rule {
  return forEcosystem(inner, { apps: GIT_APPS, normalize: expandGitAlias });
}
