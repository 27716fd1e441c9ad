#!/usr/bin/env node

/**
 * ifgen CLI entry point.
 */

import { run } from './driver.js';

process.exitCode = run(process.argv.slice(2), {
  env: process.env,
  cwd: process.cwd(),
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  colors: process.stderr.isTTY,
});
