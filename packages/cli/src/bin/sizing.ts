#!/usr/bin/env node

/**
 * Position Sizing Lab CLI Entry Point
 */

import 'dotenv/config';
import { program } from 'commander';
import { registerSizingCommands } from '../commands/sizing.js';

program
  .name('sizing')
  .description('Monte Carlo evaluation of fixed-fractional position sizes')
  .version('1.0.0');

registerSizingCommands(program);

program.configureOutput({
  writeErr: (str) => {
    process.stderr.write(str);
  },
});

program.parse();
