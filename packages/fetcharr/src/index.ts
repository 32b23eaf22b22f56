#!/usr/bin/env node
/**
 * fetcharr - resolves pending media requests against a cached-torrent catalog
 */

import { fileURLToPath } from 'node:url';

import { Command } from 'commander';

import { discrepanciesCommand } from './cli/discrepancies.js';
import { runCommand } from './cli/run.js';
import { serveCommand } from './cli/serve.js';
import { VERSION } from './shared/version.js';

const baseDir = fileURLToPath(new URL('..', import.meta.url));

const program = new Command();

program
  .name('fetcharr')
  .description('Resolve pending movie and show requests against a cached catalog')
  .version(VERSION);

program.addCommand(runCommand(baseDir));
program.addCommand(serveCommand(baseDir));
program.addCommand(discrepanciesCommand(baseDir));

program.parseAsync(process.argv);
