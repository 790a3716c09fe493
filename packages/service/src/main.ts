#!/usr/bin/env node
/**
 * @fairtab/service — Entry point.
 */

import { readFile } from "node:fs/promises";
import { runCli } from "./cli.js";

runCli(process.argv.slice(2), {
  readFile: (path) => readFile(path, "utf8"),
  stdout: (text) => {
    process.stdout.write(`${text}\n`);
  },
  stderr: (text) => {
    process.stderr.write(`${text}\n`);
  },
  env: process.env,
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error("Fatal error:", err);
    process.exitCode = 1;
  });
