/**
 * Settings snapshot. Loaded once per run and passed explicitly; never mutated.
 */

import type { Rule } from "../core/rule.js";

export const ALL_RULES = "ALL";

export interface Settings {
  /** Enabled rule names. ALL in the list enables every enabled-by-default rule as well. */
  readonly rules: readonly string[];
  readonly excludeRules: readonly string[];
  /** Per-rule priority overrides. */
  readonly priority: Readonly<Record<string, number>>;
  /** Maximum suggestions; 0 means unlimited. */
  readonly numCloseMatches: number;
  readonly requireConfirmation: boolean;
  /** Seconds to wait for the re-run of the failed command. */
  readonly waitCommand: number;
  readonly waitSlowCommand: number;
  readonly slowCommands: readonly string[];
  readonly excludedSearchPathPrefixes: readonly string[];
  /** Extra environment for captured and executed commands. */
  readonly env: Readonly<Record<string, string>>;
  readonly debug: boolean;
}

export const DEFAULT_SETTINGS: Settings = Object.freeze({
  rules: [ALL_RULES],
  excludeRules: [],
  priority: {},
  numCloseMatches: 3,
  requireConfirmation: true,
  waitCommand: 3,
  waitSlowCommand: 15,
  slowCommands: ["lein", "react-native", "gradle", "./gradlew", "vagrant"],
  excludedSearchPathPrefixes: [],
  env: {},
  debug: false,
});

/** Defaults with selected fields replaced. Handy for callers and tests. */
export function makeSettings(overrides: Partial<Settings> = {}): Settings {
  return Object.freeze({ ...DEFAULT_SETTINGS, ...overrides });
}

/**
 * Exclusion always wins. A listed rule runs; an unlisted one runs only when ALL is
 * listed and it is enabled by default.
 */
export function isRuleEnabled(settings: Settings, rule: Pick<Rule, "name" | "enabledByDefault">): boolean {
  if (settings.excludeRules.includes(rule.name)) return false;
  if (settings.rules.includes(rule.name)) return true;
  return settings.rules.includes(ALL_RULES) && rule.enabledByDefault;
}

export function getRulePriority(settings: Settings, rule: Pick<Rule, "name" | "priority">): number {
  return settings.priority[rule.name] ?? rule.priority;
}

const WRAPPER_WORDS = new Set(["sudo", "env", "time"]);
const ENV_ASSIGNMENT = /^[A-Za-z_][A-Za-z0-9_]*=/;

/** First word that is not a sudo/env/time prefix, its flags or an env assignment. */
function programWord(script: string): string {
  const words = script.trim().split(/\s+/);
  let i = 0;
  let wrapped = false;
  while (i < words.length) {
    const word = words[i] ?? "";
    if (WRAPPER_WORDS.has(word)) {
      wrapped = true;
    } else if (!(wrapped && (word.startsWith("-") || ENV_ASSIGNMENT.test(word)))) {
      return word;
    }
    i++;
  }
  return "";
}

export function isSlowCommand(settings: Settings, script: string): boolean {
  const program = programWord(script);
  if (program === "") return false;
  return settings.slowCommands.some((slow) => program === slow || program.endsWith(slow));
}

/** Seconds to wait when re-running `script` to capture its output. */
export function getWaitSeconds(settings: Settings, script: string): number {
  return isSlowCommand(settings, script) ? settings.waitSlowCommand : settings.waitCommand;
}
