import { aliasFunction, andCommands, detectShell, isAliasShell } from "../src/shells/alias.js";

describe("andCommands", () => {
  it("chains with &&", () => {
    expect(andCommands("git pull", "git push")).toBe("git pull && git push");
  });
});

describe("detectShell", () => {
  it("reads the basename of $SHELL", () => {
    expect(detectShell("/usr/bin/zsh")).toBe("zsh");
    expect(detectShell("/usr/local/bin/fish")).toBe("fish");
    expect(detectShell("/bin/bash")).toBe("bash");
    expect(detectShell("/usr/bin/pwsh")).toBe("powershell");
    expect(detectShell("C:\\Program Files\\PowerShell\\7\\pwsh.exe")).toBe("powershell");
    expect(detectShell("powershell.exe")).toBe("powershell");
  });

  it("falls back to bash", () => {
    expect(detectShell(undefined)).toBe("bash");
    expect(detectShell("/bin/tcsh")).toBe("bash");
    expect(isAliasShell("tcsh")).toBe(false);
  });
});

describe("aliasFunction", () => {
  it("reads the previous history entry in bash", () => {
    expect(aliasFunction("bash")).toBe(
      ['function whoops () {', '    WHOOPS_COMMAND="$(fc -ln -2 -2)" command whoops "$@"', "}"].join("\n"),
    );
  });

  it("uses fc -ln -1 in zsh", () => {
    expect(aliasFunction("zsh", "fix")).toBe(
      ['fix () {', '    WHOOPS_COMMAND="$(fc -ln -1)" command whoops "$@"', "}"].join("\n"),
    );
  });

  it("reads Get-History in powershell and calls the application", () => {
    expect(aliasFunction("powershell", "fix")).toBe(
      [
        "function fix {",
        "    $env:WHOOPS_COMMAND = (Get-History -Count 1).CommandLine",
        "    & (Get-Command whoops -CommandType Application | Select-Object -First 1) @args",
        "    Remove-Item Env:WHOOPS_COMMAND",
        "}",
      ].join("\n"),
    );
  });

  it("uses $history in fish", () => {
    expect(aliasFunction("fish", "retry", "/opt/whoops/bin/whoops")).toBe(
      [
        'function retry -d "Correct the previous command"',
        '    WHOOPS_COMMAND="$history[1]" command /opt/whoops/bin/whoops $argv',
        "end",
      ].join("\n"),
    );
  });
});
