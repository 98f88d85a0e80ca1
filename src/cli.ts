#!/usr/bin/env node
import { run } from "./run.js";
import { logError } from "./lib/errors.js";

run(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logError("ERROR", error);
    process.exitCode = 1;
  }
);
