import { tmpdir } from "os";
import { join } from "path";
import { parseArgs, runFix, scriptFromArgs } from "../src/cli/fix.js";
import type { CliIo, FixDeps } from "../src/cli/fix.js";
import { defineRule } from "../src/core/rule.js";
import type { SpawnRequest } from "../src/output/capture.js";

interface FakeIo extends CliIo {
  outLines: string[];
  errLines: string[];
  questions: string[];
}

function fakeIo(answer: boolean): FakeIo {
  const io: FakeIo = {
    outLines: [],
    errLines: [],
    questions: [],
    out: (line) => {
      io.outLines.push(line);
    },
    err: (line) => {
      io.errLines.push(line);
    },
    confirm: async (question) => {
      io.questions.push(question);
      return answer;
    },
  };
  return io;
}

const gitTypo = defineRule({
  name: "test_git_typo",
  isMatch: (command) => command.output.includes("is not a git command"),
  getNewCommand: (command) => [command.script.replace("stauts", "status"), command.script.replace("stauts", "stash")],
});

describe("parseArgs", () => {
  it("reads flags up to the command", () => {
    expect(parseArgs(["-y", "--config", "/tmp/s.yml", "git", "stauts", "-v"])).toEqual({
      yes: true,
      debug: false,
      help: false,
      configPath: "/tmp/s.yml",
      command: ["git", "stauts", "-v"],
    });
  });

  it("stops at -- and at unknown flags", () => {
    expect(parseArgs(["--", "-y"]).command).toEqual(["-y"]);
    expect(parseArgs(["-y", "-rf"]).command).toEqual(["-rf"]);
  });

  it("takes an optional alias name", () => {
    expect(parseArgs(["--alias"]).alias).toBe("whoops");
    expect(parseArgs(["--alias", "retry"]).alias).toBe("retry");
    expect(parseArgs(["--alias", "-y"])).toMatchObject({ alias: "whoops", yes: true });
  });
});

describe("scriptFromArgs", () => {
  it("keeps a single argument as a script and re-quotes several", () => {
    expect(scriptFromArgs([" git stauts "])).toBe("git stauts");
    expect(scriptFromArgs(["cd", "my dir"])).toBe("cd 'my dir'");
  });
});

describe("runFix", () => {
  const env: NodeJS.ProcessEnv = { XDG_CONFIG_HOME: join(tmpdir(), "whoops-cli-no-config") };
  let requests: SpawnRequest[];
  let ran: string[];

  function deps(io: FakeIo, exitCode = 0, extraEnv: NodeJS.ProcessEnv = {}): FixDeps {
    return {
      env: { ...env, ...extraEnv },
      io,
      spawner: (request) => {
        requests.push(request);
        return { stdout: "", stderr: "git: 'stauts' is not a git command. See 'git --help'.\n" };
      },
      runner: (script) => {
        ran.push(script);
        return exitCode;
      },
      rules: () => [gitTypo],
    };
  }

  beforeEach(() => {
    requests = [];
    ran = [];
  });

  it("prints usage", async () => {
    const io = fakeIo(true);
    expect(await runFix(["--help"], deps(io))).toBe(0);
    expect(io.outLines[0]?.startsWith("usage: whoops")).toBe(true);
  });

  it("fails without a command", async () => {
    const io = fakeIo(true);
    expect(await runFix([], deps(io))).toBe(1);
    expect(io.errLines).toEqual(["whoops: no command to correct (pass one, or set WHOOPS_COMMAND)"]);
    expect(requests).toEqual([]);
  });

  it("prints the shell function for the user's shell", async () => {
    const io = fakeIo(true);
    expect(await runFix(["--alias", "retry"], deps(io, 0, { SHELL: "/usr/bin/fish" }))).toBe(0);
    expect(io.outLines).toEqual([
      [
        'function retry -d "Correct the previous command"',
        '    WHOOPS_COMMAND="$history[1]" command whoops $argv',
        "end",
      ].join("\n"),
    ]);
  });

  it("lists corrections, confirms and runs the first", async () => {
    const io = fakeIo(true);
    expect(await runFix(["git", "stauts"], deps(io))).toBe(0);
    expect(requests[0]?.args.at(-1)).toBe("git stauts");
    expect(io.outLines).toEqual(["1. git stash", "2. git status"]);
    expect(io.questions).toEqual(["Run git stash? [y/N] "]);
    expect(ran).toEqual(["git stash"]);
  });

  it("skips the prompt with --yes", async () => {
    const io = fakeIo(false);
    expect(await runFix(["--yes", "git stauts"], deps(io))).toBe(0);
    expect(io.questions).toEqual([]);
    expect(ran).toEqual(["git stash"]);
  });

  it("aborts when the user declines", async () => {
    const io = fakeIo(false);
    expect(await runFix(["git stauts"], deps(io))).toBe(1);
    expect(io.errLines).toEqual(["Aborted."]);
    expect(ran).toEqual([]);
  });

  it("returns the corrected command's exit code", async () => {
    const io = fakeIo(true);
    expect(await runFix(["-y", "git stauts"], deps(io, 3))).toBe(3);
    expect(io.errLines).toEqual(["whoops: Command exited with status 3: git stash"]);
  });

  it("reads WHOOPS_COMMAND when no command is given", async () => {
    const io = fakeIo(true);
    expect(await runFix(["-y"], deps(io, 0, { WHOOPS_COMMAND: "  git stauts\n" }))).toBe(0);
    expect(requests[0]?.args.at(-1)).toBe("git stauts");
  });

  it("says so when nothing matches", async () => {
    const io = fakeIo(true);
    const quiet: FixDeps = { ...deps(io), spawner: () => ({ stdout: "ok\n", stderr: "" }) };
    expect(await runFix(["echo ok"], quiet)).toBe(0);
    expect(io.outLines).toEqual(["No corrections available for: echo ok"]);
  });
});
