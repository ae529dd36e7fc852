#!/usr/bin/env node

/**
 * buildrig CLI - runs pre/post-build tasks around an SDK build
 */

import { Command } from 'commander';
import { createRequire } from 'module';
import { registerBuildCommand } from './commands/build.js';
import { registerTasksCommand } from './commands/tasks.js';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };

const program = new Command();

program
  .name('buildrig')
  .description('Build a project for desktop and Android, with pluggable pre- and post-build tasks')
  .version(pkg.version);

registerBuildCommand(program);
registerTasksCommand(program);

await program.parseAsync();
