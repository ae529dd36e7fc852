/**
 * buildrig tasks - list the built-in tasks
 */

import { Command } from 'commander';
import { BUILTIN_TASKS } from '../tasks/index.js';
import { formatTaskTable } from '../utils/ui.js';

export function registerTasksCommand(program: Command): void {
  program
    .command('tasks')
    .description('List built-in tasks with their priority, stages and affected files')
    .action(() => {
      console.log();
      for (const line of formatTaskTable(BUILTIN_TASKS)) {
        console.log(line);
      }
      console.log();
    });
}
