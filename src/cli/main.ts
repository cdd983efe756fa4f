#!/usr/bin/env node
/**
 * Purpose: Entry point of the `matcalc` binary.
 * Intent: Bind the run loop to the real process streams and exit code.
 */

import { readStdin } from "../io/stdin.js";
import { run } from "./run.js";

const exitCode = await run(process.argv.slice(2), {
  stdout: (chunk) => {
    process.stdout.write(chunk);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  readStdin: () => readStdin(),
});
process.exitCode = exitCode;
