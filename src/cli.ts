#!/usr/bin/env node
import { runCli } from './cli/run.js';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Unexpected error:', error);
    process.exitCode = 1;
  });
