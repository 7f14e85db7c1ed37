/**
 * Command: one failed invocation (script as typed + captured output).
 * Tokens are computed on first access and cached per instance.
 */

import { shellSplit } from "./shellSplit.js";

export class Command {
  readonly script: string;
  /** stderr first, then stdout. */
  readonly output: string;
  #parts: readonly string[] | undefined;

  constructor(script: string, output: string) {
    this.script = script;
    this.output = output;
    Object.freeze(this);
  }

  /** Shell words of the script. Falls back to whitespace splitting when the script does not lex. */
  get parts(): readonly string[] {
    if (this.#parts === undefined) {
      this.#parts = Object.freeze(tokenize(this.script));
    }
    return this.#parts;
  }

  /** Same output, different script. The new instance tokenizes its own script. */
  withScript(script: string): Command {
    return new Command(script, this.output);
  }

  toString(): string {
    return `Command(script=${JSON.stringify(this.script)}, output=${JSON.stringify(this.output)})`;
  }
}

function tokenize(script: string): string[] {
  try {
    return shellSplit(script);
  } catch {
    return script.split(/\s+/).filter((word) => word !== "");
  }
}
