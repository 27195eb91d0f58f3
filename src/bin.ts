#!/usr/bin/env node
// src/bin.ts

import { run } from './cli';

run(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (e: unknown) => {
    console.error('❌ Fatal:', e);
    process.exit(1);
  },
);
