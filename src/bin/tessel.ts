#!/usr/bin/env node
import { runTessel } from './tessel-core.js';

runTessel()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error(`Tessel CLI error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  });
