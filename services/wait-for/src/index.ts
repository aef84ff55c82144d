#!/usr/bin/env tsx
import 'dotenv/config';
import { hideBin } from 'yargs/helpers';
import { EXIT_FATAL, runCli } from './cli';

runCli(hideBin(process.argv))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    // eslint-disable-next-line no-console
    console.error('[readygate] fatal', err);
    process.exitCode = EXIT_FATAL;
  });
