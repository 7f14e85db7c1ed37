/**
 * docker_not_command: `docker: 'pus' is not a docker command.`
 */

import { defineRule } from "../core/rule.js";
import { forApp } from "../core/scoped.js";
import { getCloseMatches } from "../fuzzy/closeMatches.js";
import { replaceArgument } from "../util/executables.js";

const DOCKER_SUBCOMMANDS = [
  "attach",
  "build",
  "commit",
  "compose",
  "cp",
  "create",
  "exec",
  "images",
  "info",
  "inspect",
  "kill",
  "login",
  "logout",
  "logs",
  "network",
  "ps",
  "pull",
  "push",
  "restart",
  "rm",
  "rmi",
  "run",
  "start",
  "stop",
  "tag",
  "volume",
];

const NOT_A_COMMAND = /docker: '(\w+)' is not a docker command/;

export const dockerNotCommand = forApp(
  defineRule({
    name: "docker_not_command",
    isMatch: (command) =>
      command.output.includes("is not a docker command") ||
      command.output.includes("Usage:\tdocker") ||
      command.output.includes("Usage: docker"),
    getNewCommand: (command) => {
      const wrong = NOT_A_COMMAND.exec(command.output)?.[1] ?? command.parts[1];
      if (wrong === undefined) return [];
      return getCloseMatches(wrong, DOCKER_SUBCOMMANDS).map((fixed) =>
        replaceArgument(command.script, wrong, fixed),
      );
    },
  }),
  ["docker"],
);
