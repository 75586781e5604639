#!/usr/bin/env node
/**
 * Runthrough CLI
 *
 * Usage:
 *   runthrough                          # default iPod database, XML to stdout
 *   runthrough ./GNUtunesDB.xml --write # rewrite the file in place
 *   runthrough --list --seed 7          # show the ranked order
 */
import { runCli } from './cli/run.js';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error('Fatal:', err);
    process.exit(1);
  });
