/**
 * Error types surfaced by the engine and its collaborators.
 */

/** Raised by shellSplit on an unterminated quote or a dangling escape. */
export class ShellSplitError extends Error {
  readonly script: string;

  constructor(message: string, script: string) {
    super(message);
    this.name = "ShellSplitError";
    this.script = script;
  }
}

/** The corrected command ran and exited non-zero. */
export class CommandExitError extends Error {
  readonly exitCode: number;
  readonly script: string;

  constructor(script: string, exitCode: number) {
    super(`Command exited with status ${exitCode}: ${script}`);
    this.name = "CommandExitError";
    this.exitCode = exitCode;
    this.script = script;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
