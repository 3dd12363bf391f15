#!/usr/bin/env node
/**
 * wdl-atlas CLI
 *
 * Usage:
 *   wdl-atlas generate [root] [options]
 *   wdl-atlas graph <file.wdl> -o <out.md>
 */

import { runCli } from "../cli";

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Fatal error: ${message}`);
    process.exit(1);
  });
