#!/usr/bin/env node
/**
 * dupewarden - find duplicate files, keep one copy, quarantine the rest
 */

import { config } from 'dotenv';
import { runCli } from './cli.js';

config();

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error('Error:', error);
    process.exit(1);
  });
