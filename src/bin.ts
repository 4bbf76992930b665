#!/usr/bin/env node
import { run } from './cli';
import { loadEnvFiles } from './config';

loadEnvFiles();
run(process.argv.slice(2)).then(
  code => {
    process.exitCode = code;
  },
  (e: unknown) => {
    console.error(e);
    process.exitCode = 1;
  }
);
