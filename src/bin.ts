#!/usr/bin/env node

import { main } from './cli.js';

try {
  const exitCode = main();
  if (exitCode !== 0) process.exitCode = exitCode;
} catch (e) {
  process.stderr.write(`linkmend failed: ${e instanceof Error ? e.message : String(e)}\n`);
  process.exitCode = 1;
}
