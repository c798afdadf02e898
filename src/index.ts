#!/usr/bin/env node
// src/index.ts
import dotenv from 'dotenv';
import { hideBin } from 'yargs/helpers';
import { ExitCode, runCli } from './cli.js';

dotenv.config();

const controller = new AbortController();

// first Ctrl-C stops the consent wait or stops after the current event, a second one kills the process
process.once('SIGINT', () => {
  console.log('\ninterrupted, stopping');
  controller.abort();
});

runCli(hideBin(process.argv), { signal: controller.signal })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error('unhandled', err);
    process.exitCode = ExitCode.Fatal;
  });
