#!/usr/bin/env node
import { program } from 'commander';
import { loadDotEnv } from './boundaries/dotenv-loader';
import { registerSplitCommand } from './cli/split-command';
import { registerTokenizeCommand } from './cli/tokenize-command';
import packageJson from '../package.json';

// Load environment variables at startup
loadDotEnv();

// Set up Commander program
program
  .name('tokensplit')
  .description('Split text into token-bounded, optionally overlapping chunks')
  .version(packageJson.version);

// Register commands
registerSplitCommand(program);
registerTokenizeCommand(program);

await program.parseAsync(process.argv);
