#!/usr/bin/env node
import dotenv from 'dotenv';
dotenv.config();

import { runCli } from './cli';

// stdout carries only the inventory JSON; logs go to stderr
runCli(process.argv.slice(2), {
  env: process.env,
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error('[mlm-inventory] Unexpected failure:', err);
    process.exitCode = 1;
  });
