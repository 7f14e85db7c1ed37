/**
 * whoops library surface: command model, rules and wrappers, corrector, execution.
 */

export { Command } from "./core/command.js";
export { shellJoin, shellQuote, shellSplit } from "./core/shellSplit.js";
export { CommandExitError, ShellSplitError } from "./core/errors.js";
export { DEFAULT_PRIORITY, defineRule } from "./core/rule.js";
export type { Rule, RuleSpec } from "./core/rule.js";
export { appName, expandGitAlias, forApp, forEcosystem, gitSupport, isApp } from "./core/scoped.js";
export type { Ecosystem } from "./core/scoped.js";
export { compareCorrected, organizeCorrected } from "./core/corrected.js";
export type { CorrectedCommand, SideEffectRef } from "./core/corrected.js";
export { getBestCorrection, getCorrectedCommands, matchRule } from "./core/corrector.js";
export { resolveShell, runCorrected, runInShell } from "./core/run.js";
export type { ScriptRunner } from "./core/run.js";
export { getCloseMatches, getClosest } from "./fuzzy/closeMatches.js";
export { jaro, jaroWinkler, similarity } from "./fuzzy/jaroWinkler.js";
export {
  getAllExecutables,
  getAllMatchedCommands,
  replaceArgument,
  replaceCommand,
  which,
} from "./util/executables.js";
export { ALL_RULES, DEFAULT_SETTINGS, isRuleEnabled, makeSettings } from "./config/settings.js";
export type { Settings } from "./config/settings.js";
export { loadSettings } from "./config/loadSettings.js";
export type { LoadSettingsOptions, LoadedSettings } from "./config/loadSettings.js";
export { getOutput } from "./output/capture.js";
export type { Spawner } from "./output/capture.js";
export { getAllRules } from "./rules/index.js";
export type { RuleContext } from "./rules/index.js";
export { createLogger, setLogLevel } from "./log/logger.js";
