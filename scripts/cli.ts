#!/usr/bin/env node
/**
 * whoops entry point. See src/cli/fix.ts for flags and exit codes.
 */

import { runFix } from "../src/cli/fix.js";
import { errorMessage } from "../src/core/errors.js";

runFix(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    console.error(`whoops: ${errorMessage(err)}`);
    process.exit(1);
  });
