/**
 * Execute a chosen correction through the platform shell with inherited stdio.
 * Exit 0 → the originating rule's side effect runs. Non-zero → CommandExitError.
 */

import { spawnSync } from "child_process";
import type { Command } from "./command.js";
import type { CorrectedCommand } from "./corrected.js";
import { CommandExitError } from "./errors.js";
import type { Settings } from "../config/settings.js";
import { createLogger } from "../log/logger.js";

const log = createLogger("run");

export interface ShellInvocation {
  program: string;
  /** Arguments placed before the script. */
  args: string[];
}

function shellArgs(program: string): string[] {
  const lower = program.toLowerCase();
  if (lower.includes("powershell") || lower.includes("pwsh")) {
    return ["-NoProfile", "-NonInteractive", "-Command"];
  }
  if (lower.includes("cmd")) return ["/C"];
  return ["-c"];
}

/** WHOOPS_SHELL wins; otherwise COMSPEC on Windows and /bin/sh elsewhere. */
export function resolveShell(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): ShellInvocation {
  const override = env.WHOOPS_SHELL?.trim();
  let program: string;
  if (override) {
    program = override;
  } else if (platform === "win32") {
    program = env.COMSPEC?.trim() || "cmd.exe";
  } else {
    program = "/bin/sh";
  }
  return { program, args: shellArgs(program) };
}

export function commandEnv(settings: Settings): NodeJS.ProcessEnv {
  return { ...process.env, ...settings.env };
}

/** Runs a script to completion and returns its exit code. */
export type ScriptRunner = (script: string, env: NodeJS.ProcessEnv) => number;

export const runInShell: ScriptRunner = (script, env) => {
  const shell = resolveShell(env);
  const result = spawnSync(shell.program, [...shell.args, script], {
    stdio: "inherit",
    env,
  });
  if (result.error) throw result.error;
  // status is null when the child was killed by a signal
  return result.status ?? 1;
};

export function runCorrected(
  corrected: CorrectedCommand,
  original: Command,
  settings: Settings,
  runner: ScriptRunner = runInShell,
): void {
  log.debug(`running ${JSON.stringify(corrected.script)} in place of ${JSON.stringify(original.script)}`);
  const exitCode = runner(corrected.script, commandEnv(settings));
  if (exitCode !== 0) {
    throw new CommandExitError(corrected.script, exitCode);
  }

  const ref = corrected.sideEffect;
  if (ref !== undefined) {
    log.debug(`side effect of ${ref.rule.name}`);
    ref.rule.sideEffect?.(ref.command, corrected.script);
  }
}
