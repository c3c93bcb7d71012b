#!/usr/bin/env node
import { program } from 'commander';
import { registerMainCommand } from './cli/commands';
import { CLI_VERSION } from './config/constants';

// Set up Commander program
program
  .name('chunkwise')
  .description('Split text into size-bounded chunks along natural boundaries')
  .version(CLI_VERSION);

registerMainCommand(program);

// Parse command line arguments
program.parse();
