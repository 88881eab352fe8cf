#!/usr/bin/env node
// ── CLI Entry Point ───────────────────────────────────────────────────────

import { run } from './cli.js';

run(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    console.error(e);
    process.exitCode = 1;
  },
);
