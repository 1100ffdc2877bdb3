#!/usr/bin/env node
import { EXIT_UNEXPECTED, runCli } from './main';
import { describeError } from './errors';

const controller = new AbortController();
process.once('SIGINT', () => controller.abort());

runCli(process.argv.slice(2), { signal: controller.signal })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.stderr.write(`Error: ${describeError(error)}\n`);
    process.exitCode = EXIT_UNEXPECTED;
  });
