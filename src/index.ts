#!/usr/bin/env node
import { runCli } from "./cli.js";
import { describeError, LabbookError } from "./errors.js";

runCli(process.argv.slice(2)).catch((error: unknown) => {
  if (error instanceof LabbookError) {
    console.error(`Error: ${describeError(error)}`);
  } else if (error instanceof Error) {
    console.error(`Error: ${error.message}`);
    if (error.stack && process.env.LABBOOK_DEBUG) {
      console.error(error.stack);
    }
  } else {
    console.error(`Error: ${String(error)}`);
  }
  process.exitCode = 1;
});
