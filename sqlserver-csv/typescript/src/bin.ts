#!/usr/bin/env node
import { main } from './cli.js';
import { errorMessage } from './errors/index.js';

// Write failures reach the CSV writer through its callbacks.
process.stdout.on('error', (error: Error) => {
  process.stderr.write(`stdout: ${error.message}\n`);
});

main(process.argv.slice(2), process.env, {
  stdin: process.stdin,
  stdout: process.stdout,
  stderr: process.stderr,
}).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`${errorMessage(error)}\n`);
    process.exitCode = 1;
  }
);
