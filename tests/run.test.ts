import { makeSettings } from "../src/config/settings.js";
import { Command } from "../src/core/command.js";
import type { CorrectedCommand } from "../src/core/corrected.js";
import { CommandExitError } from "../src/core/errors.js";
import { defineRule } from "../src/core/rule.js";
import { resolveShell, runCorrected } from "../src/core/run.js";
import type { ScriptRunner } from "../src/core/run.js";

describe("runCorrected", () => {
  const original = new Command("git push", "fatal: The current branch has no upstream branch.");
  const effects: Array<[string, string]> = [];
  const rule = defineRule({
    name: "tracking",
    isMatch: () => true,
    getNewCommand: () => ["git push --set-upstream origin main"],
    sideEffect: (command, script) => {
      effects.push([command.script, script]);
    },
  });
  const corrected: CorrectedCommand = {
    script: "git push --set-upstream origin main",
    priority: 1000,
    sideEffect: { rule, command: original },
  };

  beforeEach(() => {
    effects.length = 0;
  });

  it("runs the script and then the side effect on success", () => {
    const ran: string[] = [];
    const runner: ScriptRunner = (script) => {
      ran.push(script);
      return 0;
    };
    runCorrected(corrected, original, makeSettings(), runner);
    expect(ran).toEqual(["git push --set-upstream origin main"]);
    expect(effects).toEqual([["git push", "git push --set-upstream origin main"]]);
  });

  it("throws CommandExitError on a non-zero exit and skips the side effect", () => {
    let caught: unknown;
    try {
      runCorrected(corrected, original, makeSettings(), () => 2);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(CommandExitError);
    if (!(caught instanceof CommandExitError)) return;
    expect(caught.exitCode).toBe(2);
    expect(caught.script).toBe("git push --set-upstream origin main");
    expect(caught.message).toBe("Command exited with status 2: git push --set-upstream origin main");
    expect(effects).toEqual([]);
  });

  it("works without a side effect", () => {
    expect(() => runCorrected({ script: "ls", priority: 100 }, new Command("sl", "x"), makeSettings(), () => 0)).not.toThrow();
  });

  it("passes configured env to the runner", () => {
    let seen: NodeJS.ProcessEnv = {};
    const runner: ScriptRunner = (_script, env) => {
      seen = env;
      return 0;
    };
    runCorrected({ script: "ls", priority: 100 }, original, makeSettings({ env: { WHOOPS_TEST_VAR: "on" } }), runner);
    expect(seen.WHOOPS_TEST_VAR).toBe("on");
  });
});

describe("resolveShell", () => {
  it("uses /bin/sh -c on POSIX systems", () => {
    expect(resolveShell({}, "linux")).toEqual({ program: "/bin/sh", args: ["-c"] });
    expect(resolveShell({ COMSPEC: "cmd.exe" }, "darwin")).toEqual({ program: "/bin/sh", args: ["-c"] });
  });

  it("honours WHOOPS_SHELL", () => {
    expect(resolveShell({ WHOOPS_SHELL: "/bin/bash" }, "linux")).toEqual({ program: "/bin/bash", args: ["-c"] });
    expect(resolveShell({ WHOOPS_SHELL: "pwsh" }, "linux")).toEqual({
      program: "pwsh",
      args: ["-NoProfile", "-NonInteractive", "-Command"],
    });
  });

  it("uses COMSPEC on Windows", () => {
    expect(resolveShell({ COMSPEC: "C:\\Windows\\system32\\cmd.exe" }, "win32")).toEqual({
      program: "C:\\Windows\\system32\\cmd.exe",
      args: ["/C"],
    });
    expect(resolveShell({}, "win32")).toEqual({ program: "cmd.exe", args: ["/C"] });
  });
});
