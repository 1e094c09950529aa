#!/usr/bin/env node
/**
 * tern binary
 */

import { main } from './cli-exec.js';
import { formatError } from './cli-shared.js';

void main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(formatError(err));
    process.exitCode = 1;
  }
);
