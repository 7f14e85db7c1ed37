/**
 * whoops CLI: re-run the failed command, list corrections, run the chosen one.
 *
 *   whoops [--yes|-y] [--debug|-d] [--config <path>] [--] <command...>
 *   whoops --alias [name]
 *
 * Without a command, WHOOPS_COMMAND is used (the shell function from --alias sets it).
 * Exit code: the corrected command's own on failure, 1 when there is nothing to run
 * or the user declines, 0 otherwise.
 */

import { createInterface } from "readline";
import { loadSettings } from "../config/loadSettings.js";
import type { Settings } from "../config/settings.js";
import { Command } from "../core/command.js";
import { getCorrectedCommands } from "../core/corrector.js";
import { CommandExitError } from "../core/errors.js";
import type { Rule } from "../core/rule.js";
import { runCorrected } from "../core/run.js";
import type { ScriptRunner } from "../core/run.js";
import { shellJoin } from "../core/shellSplit.js";
import { setLogLevel } from "../log/logger.js";
import { getOutput } from "../output/capture.js";
import type { Spawner } from "../output/capture.js";
import { getAllRules } from "../rules/index.js";
import { aliasFunction, detectShell } from "../shells/alias.js";

export const USAGE = [
  "usage: whoops [--yes|-y] [--debug|-d] [--config <path>] [--] <command...>",
  "       whoops --alias [name]",
  "",
  "Re-runs a failed command, suggests corrections and runs the one you pick.",
  "Without a command, the WHOOPS_COMMAND environment variable is corrected.",
].join("\n");

export interface CliArgs {
  yes: boolean;
  debug: boolean;
  help: boolean;
  /** Set when --alias was given; the function name, "whoops" unless one followed. */
  alias?: string;
  configPath?: string;
  command: string[];
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { yes: false, debug: false, help: false, command: [] };
  let i = 0;
  while (i < argv.length) {
    const arg = argv[i] ?? "";
    if (arg === "--") {
      args.command = argv.slice(i + 1);
      return args;
    }
    if (!arg.startsWith("-")) {
      args.command = argv.slice(i);
      return args;
    }
    if (arg === "--yes" || arg === "-y") {
      args.yes = true;
    } else if (arg === "--debug" || arg === "-d") {
      args.debug = true;
    } else if (arg === "--help" || arg === "-h") {
      args.help = true;
    } else if (arg === "--config") {
      const value = argv[i + 1];
      if (value !== undefined) {
        args.configPath = value;
        i++;
      }
    } else if (arg === "--alias") {
      const value = argv[i + 1];
      if (value !== undefined && !value.startsWith("-")) {
        args.alias = value;
        i++;
      } else {
        args.alias = "whoops";
      }
    } else {
      // first unknown flag starts the command, e.g. `whoops -rf dir` is not ours
      args.command = argv.slice(i);
      return args;
    }
    i++;
  }
  return args;
}

/** A single argument is taken as a whole script; several are argv and get re-quoted. */
export function scriptFromArgs(words: readonly string[]): string {
  if (words.length === 1) return (words[0] ?? "").trim();
  return shellJoin(words);
}

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
  confirm(question: string): Promise<boolean>;
}

export function promptYesNo(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(/^(y|yes)$/i.test(answer.trim()));
    });
  });
}

export const consoleIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  confirm: promptYesNo,
};

export interface FixDeps {
  env?: NodeJS.ProcessEnv;
  io?: CliIo;
  runner?: ScriptRunner;
  spawner?: Spawner;
  rules?: (settings: Settings) => readonly Rule[];
}

export async function runFix(argv: readonly string[], deps: FixDeps = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const io = deps.io ?? consoleIo;
  const args = parseArgs(argv);

  if (args.help) {
    io.out(USAGE);
    return 0;
  }
  if (args.alias !== undefined) {
    io.out(aliasFunction(detectShell(env.SHELL), args.alias));
    return 0;
  }

  const script = args.command.length > 0 ? scriptFromArgs(args.command) : (env.WHOOPS_COMMAND ?? "").trim();
  if (script === "") {
    io.err("whoops: no command to correct (pass one, or set WHOOPS_COMMAND)");
    return 1;
  }

  const overrides: Partial<Settings> = {
    ...(args.yes ? { requireConfirmation: false } : {}),
    ...(args.debug ? { debug: true } : {}),
  };
  const { settings } = loadSettings({ configPath: args.configPath, env, overrides });
  if (settings.debug) setLogLevel("debug");

  const command = new Command(script, getOutput(script, settings, deps.spawner));
  const rules = deps.rules
    ? deps.rules(settings)
    : getAllRules({ excludedSearchPathPrefixes: settings.excludedSearchPathPrefixes });
  const corrections = getCorrectedCommands(command, settings, rules);

  const first = corrections[0];
  if (first === undefined) {
    io.out(`No corrections available for: ${script}`);
    return 0;
  }

  corrections.forEach((c, i) => io.out(`${i + 1}. ${c.script}`));

  if (settings.requireConfirmation) {
    const ok = await io.confirm(`Run ${first.script}? [y/N] `);
    if (!ok) {
      io.err("Aborted.");
      return 1;
    }
  }

  try {
    runCorrected(first, command, settings, deps.runner);
  } catch (err) {
    if (err instanceof CommandExitError) {
      io.err(`whoops: ${err.message}`);
      return err.exitCode;
    }
    throw err;
  }
  return 0;
}
