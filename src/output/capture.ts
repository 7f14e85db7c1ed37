/**
 * Re-run the failed command to capture what it printed. stderr first, then stdout.
 * Runs under a timeout; a slow or hung command yields whatever it wrote so far.
 */

import { spawnSync } from "child_process";
import { getWaitSeconds } from "../config/settings.js";
import type { Settings } from "../config/settings.js";
import { resolveShell } from "../core/run.js";
import { createLogger } from "../log/logger.js";

const log = createLogger("capture");

/**
 * Always set while capturing: C locale so messages are untranslated, and git's
 * alias trace so git rules can see what an alias expanded to.
 */
export const CAPTURE_ENV: Readonly<Record<string, string>> = Object.freeze({
  LC_ALL: "C",
  LANG: "C",
  GIT_TRACE: "1",
});

export interface SpawnRequest {
  program: string;
  args: string[];
  env: NodeJS.ProcessEnv;
  timeoutMs: number;
}

export interface SpawnResult {
  stdout: string;
  stderr: string;
  /** Set when the process could not start or was killed by the timeout. */
  error?: Error;
}

export type Spawner = (request: SpawnRequest) => SpawnResult;

export const spawnCapture: Spawner = (request) => {
  const result = spawnSync(request.program, request.args, {
    env: request.env,
    encoding: "utf8",
    timeout: request.timeoutMs,
    killSignal: "SIGKILL",
    stdio: ["ignore", "pipe", "pipe"],
    maxBuffer: 4 * 1024 * 1024,
  });
  return {
    stdout: result.stdout ?? "",
    stderr: result.stderr ?? "",
    error: result.error,
  };
};

/** stderr then stdout, separated by a newline unless stderr already ends with one. */
export function mergeOutput(stderr: string, stdout: string): string {
  if (stderr === "") return stdout;
  if (stdout === "") return stderr;
  return stderr.endsWith("\n") ? stderr + stdout : `${stderr}\n${stdout}`;
}

export function getOutput(script: string, settings: Settings, spawner: Spawner = spawnCapture): string {
  const env: NodeJS.ProcessEnv = { ...process.env, ...CAPTURE_ENV, ...settings.env };
  const shell = resolveShell(env);
  const seconds = getWaitSeconds(settings, script);
  log.debug(`capturing output of ${JSON.stringify(script)} (timeout ${seconds}s)`);

  const result = spawner({
    program: shell.program,
    args: [...shell.args, script],
    env,
    timeoutMs: seconds * 1000,
  });
  if (result.error) {
    log.debug(`capture stopped early: ${result.error.message}`);
  }
  return mergeOutput(result.stderr, result.stdout);
}
