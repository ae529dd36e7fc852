import chalk from 'chalk';
import type { TaskPlugin, PipelineConfig } from '@buildrig/core';
import { deriveTaskName } from '@buildrig/core';

export function success(msg: string): void {
  console.log(chalk.green('  ✓') + ' ' + msg);
}

export function failure(msg: string): void {
  console.error(chalk.red('  ✗') + ' ' + msg);
}

/** Rows of the `tasks` listing, highest priority first */
export function formatTaskTable<C extends PipelineConfig>(plugins: readonly TaskPlugin<C>[]): string[] {
  const rows = [...plugins]
    .sort((a, b) => b.priority - a.priority)
    .map((plugin) => ({
      name: deriveTaskName(plugin.typeName),
      priority: String(plugin.priority),
      stages: plugin.stages.length > 0 ? plugin.stages.join(', ') : '-',
      files: plugin.affectedFiles.join(', '),
    }));

  const nameWidth = Math.max(4, ...rows.map((r) => r.name.length));
  const priorityWidth = Math.max(8, ...rows.map((r) => r.priority.length));
  const stageWidth = Math.max(6, ...rows.map((r) => r.stages.length));

  const lines = [
    chalk.bold(
      `  ${'Task'.padEnd(nameWidth)}  ${'Priority'.padStart(priorityWidth)}  ${'Stages'.padEnd(stageWidth)}  Affected files`
    ),
  ];
  for (const row of rows) {
    lines.push(
      (
        `  ${chalk.cyan(row.name.padEnd(nameWidth))}  ${row.priority.padStart(priorityWidth)}  ` +
        `${row.stages.padEnd(stageWidth)}  ${chalk.dim(row.files)}`
      ).trimEnd()
    );
  }
  return lines;
}
