#!/usr/bin/env tsx
import { processIO } from './utils/io';
import { runCli } from './program';

runCli(process.argv.slice(2), processIO())
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = 1;
  });
