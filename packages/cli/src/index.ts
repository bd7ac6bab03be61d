#!/usr/bin/env node

import { Command } from 'commander';
import { listCommand } from './commands/list.js';
import { showCommand } from './commands/show.js';
import { tourCommand } from './commands/tour.js';
import { readPackageVersion } from './utils/package-info.js';

const program = new Command();

program
  .name('featuretour')
  .description('Page through a catalog of feature topics')
  .version(readPackageVersion());

program.addCommand(listCommand);
program.addCommand(showCommand);
program.addCommand(tourCommand);

await program.parseAsync();
