import { Command } from "../src/core/command.js";

describe("Command", () => {
  it("tokenizes with shell quoting", () => {
    const cmd = new Command("git commit -m 'hello world'", "");
    expect(cmd.parts).toEqual(["git", "commit", "-m", "hello world"]);
  });

  it("computes parts once and returns the same array", () => {
    const cmd = new Command("ls -la", "");
    const first = cmd.parts;
    expect(cmd.parts).toBe(first);
    expect(Object.isFrozen(first)).toBe(true);
  });

  it("falls back to whitespace splitting when the script does not lex", () => {
    const cmd = new Command("echo 'unterminated  string", "");
    expect(cmd.parts).toEqual(["echo", "'unterminated", "string"]);
  });

  it("derives a new command with the same output and its own tokens", () => {
    const original = new Command("git co master", "trace: alias expansion: co => 'checkout'");
    const originalParts = original.parts;
    const derived = original.withScript("git checkout master");

    expect(derived).not.toBe(original);
    expect(derived.output).toBe(original.output);
    expect(derived.parts).toEqual(["git", "checkout", "master"]);
    expect(original.script).toBe("git co master");
    expect(original.parts).toBe(originalParts);
  });

  it("is frozen", () => {
    const cmd = new Command("ls", "out");
    expect(Object.isFrozen(cmd)).toBe(true);
    expect(cmd.toString()).toBe('Command(script="ls", output="out")');
  });

  it("has no parts for an empty script", () => {
    expect(new Command("", "").parts).toEqual([]);
  });
});
