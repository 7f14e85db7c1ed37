/**
 * Shell glue: command chaining and the function `whoops --alias` prints for the
 * user's rc file. The function hands the previous history entry to WHOOPS_COMMAND and
 * calls the binary through `command`, so it may share the binary's name.
 */

export type AliasShell = "bash" | "zsh" | "fish" | "powershell";

export const SUPPORTED_SHELLS: readonly AliasShell[] = ["bash", "zsh", "fish", "powershell"];

/** Run `second` only when `first` succeeds. */
export function andCommands(first: string, second: string): string {
  return `${first} && ${second}`;
}

export function isAliasShell(value: string): value is AliasShell {
  return SUPPORTED_SHELLS.some((shell) => shell === value);
}

/** Shell name from a $SHELL path such as /usr/bin/zsh. Falls back to bash. */
export function detectShell(shellPath: string | undefined): AliasShell {
  const base = (shellPath ?? "").split(/[/\\]/).pop() ?? "";
  const name = base.toLowerCase().replace(/\.exe$/, "");
  if (name === "pwsh") return "powershell";
  return isAliasShell(name) ? name : "bash";
}

export function aliasFunction(shell: AliasShell, name = "whoops", program = "whoops"): string {
  switch (shell) {
    case "fish":
      return [
        `function ${name} -d "Correct the previous command"`,
        `    WHOOPS_COMMAND="$history[1]" command ${program} $argv`,
        "end",
      ].join("\n");
    case "zsh":
      return [`${name} () {`, `    WHOOPS_COMMAND="$(fc -ln -1)" command ${program} "$@"`, "}"].join("\n");
    case "powershell":
      // functions shadow applications, so the binary is looked up explicitly
      return [
        `function ${name} {`,
        "    $env:WHOOPS_COMMAND = (Get-History -Count 1).CommandLine",
        `    & (Get-Command ${program} -CommandType Application | Select-Object -First 1) @args`,
        "    Remove-Item Env:WHOOPS_COMMAND",
        "}",
      ].join("\n");
    case "bash":
      // bash has already recorded this invocation, so the failed command is one further back
      return [`function ${name} () {`, `    WHOOPS_COMMAND="$(fc -ln -2 -2)" command ${program} "$@"`, "}"].join("\n");
  }
}
