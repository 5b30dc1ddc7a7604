#!/usr/bin/env node
import { runReleaseIndexCli } from './lib/release_index/cli.js';

runReleaseIndexCli()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
