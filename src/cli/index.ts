#!/usr/bin/env node
/**
 * task-bundle-migrate CLI entry point
 */

import { createProgram } from './program.js';

const program = createProgram();

if (process.argv.slice(2).length === 0) {
  program.outputHelp();
} else {
  await program.parseAsync(process.argv);
}
