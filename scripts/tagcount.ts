#!/usr/bin/env -S npx tsx
/**
 * tagcount command line entry point
 */

import { runCli } from "../src/cli";

process.exitCode = await runCli(process.argv.slice(2), {
  stdout: process.stdout,
  stderr: process.stderr,
});
