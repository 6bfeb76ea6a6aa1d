#!/usr/bin/env node
/**
 * dockship CLI entry point
 */

import { argv } from 'node:process';
import { runCli } from './program';

runCli(argv)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('❌ Unexpected failure:', error);
    process.exitCode = 1;
  });
