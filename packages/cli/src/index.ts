#!/usr/bin/env node

/**
 * dshop: Domeneshop from the command line.
 */

import { createRuntime } from './context.js';
import { runCli } from './program.js';

runCli(process.argv.slice(2), createRuntime())
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: Error) => {
    console.error(`Error: ${err.message}`);
    process.exitCode = 1;
  });
