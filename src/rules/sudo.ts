/**
 * sudo: re-run with elevated privileges when the output complains about permissions.
 */

import { defineRule } from "../core/rule.js";
import { appName } from "../core/scoped.js";

const PERMISSION_PATTERNS = [
  "permission denied",
  "eacces",
  "operation not permitted",
  "you cannot perform this operation unless you are root",
  "must be root",
  "need to be root",
  "needs to be run as root",
  "requires superuser privileges",
  "requires root",
  "access denied",
  "must have root privileges",
  "read-only file system",
  "only root can",
  "must be superuser",
  "you need root privileges",
  "insufficient permissions",
  "are you root?",
  "please run as root",
  "not allowed to perform this operation",
];

/** Already elevated, or elevation tools themselves. */
const ELEVATORS = new Set(["sudo", "su", "pkexec", "doas", "runas"]);

export const sudo = defineRule({
  name: "sudo",
  priority: 50,
  isMatch: (command) => {
    if (ELEVATORS.has(appName(command).toLowerCase())) return false;
    const output = command.output.toLowerCase();
    return PERMISSION_PATTERNS.some((pattern) => output.includes(pattern));
  },
  // -E keeps the caller's environment so $VARS in the script still expand to the same values
  getNewCommand: (command) =>
    command.script.includes("$") ? [`sudo -E ${command.script}`] : [`sudo ${command.script}`],
});
