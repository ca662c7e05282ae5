#!/usr/bin/env node
import { errorMessage } from "@transcript-digest/errors";
import { runCli } from "./cli.js";

runCli(process.argv.slice(2), {
  env: process.env,
  stdout: process.stdout,
  stderr: process.stderr,
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    process.stderr.write(`[transcript-digest] Fatal error: ${errorMessage(err)}\n`);
    process.exitCode = 1;
  });
