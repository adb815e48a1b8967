#!/usr/bin/env -S node --import tsx
/**
 * rtb-pricer entry point
 *
 * Loads .env, then runs the command line against process I/O.
 */

import "dotenv/config";
import { createProgram } from "./program.js";

const program = createProgram({
  env: process.env,
  stdout: (text) => process.stdout.write(text),
  setExitCode: (code) => {
    process.exitCode = code;
  },
});

await program.parseAsync(process.argv);
