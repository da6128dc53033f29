#!/usr/bin/env node
import { run } from '../cli/index.js';

run(process.argv).catch((error: unknown) => {
  process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
