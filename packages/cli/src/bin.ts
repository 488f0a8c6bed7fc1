#!/usr/bin/env node

import { main } from "./cli.js";

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    process.stderr.write(`[pytrim] Fatal: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exit(1);
  });
