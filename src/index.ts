#!/usr/bin/env node
import { hideBin } from 'yargs/helpers';
import { runCli } from './cli';

process.on('SIGINT', () => process.exit(0));
process.on('SIGTERM', () => process.exit(0));

runCli(hideBin(process.argv)).then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    // eslint-disable-next-line no-console
    console.error(e);
    process.exitCode = 1;
  },
);
