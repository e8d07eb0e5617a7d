#!/usr/bin/env node

/**
 * cloud-upload CLI - upload files and folder trees to cloud storage
 */

import { Command } from 'commander';
import { createRequire } from 'module';
import { registerUploadCommand } from './commands/upload.js';
import { registerLoginCommand } from './commands/login.js';
import { registerListCommand } from './commands/list.js';
import { registerConfigCommands } from './commands/config.js';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };

const program = new Command();

program
  .name('cloud-upload')
  .description('Upload files and folders to cloud storage, mirroring the local directory tree')
  .version(pkg.version)
  .option('--config <file>', 'Path to the settings file')
  .option('-v, --verbose', 'Debug logging to stderr');

registerUploadCommand(program);
registerLoginCommand(program);
registerListCommand(program);
registerConfigCommands(program);

await program.parseAsync();
