#!/usr/bin/env node
import { runCli } from "./cli/program.js";
import { runUpdater } from "./runtime.js";

void runCli(process.argv, {
  // eslint-disable-next-line no-console
  print: (line) => console.log(line),
  // eslint-disable-next-line no-console
  printError: (line) => console.error(line),
  env: process.env,
  run: runUpdater,
  exit: (code) => process.exit(code)
});
