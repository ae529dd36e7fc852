/**
 * Spawns external commands and streams their output into the logger.
 *
 * stdout and stderr are merged line by line. Blank lines are dropped;
 * every other line is logged at debug level and returned to the caller.
 */

import { spawn } from 'node:child_process';
import * as readline from 'node:readline';
import type { Logger, ProcessResult, ProcessRunner, RunOptions } from '@buildrig/core';

/** Exit code reported when the command could not be started at all */
export const SPAWN_FAILURE_EXIT_CODE = 127;

export function createProcessRunner(parentLogger: Logger): ProcessRunner {
  const logger = parentLogger.child({ component: 'process-runner' });

  return {
    run(command: string, args: string[], options: RunOptions = {}): Promise<ProcessResult> {
      logger.debug({ command, args, cwd: options.cwd }, `Running '${command} ${args.join(' ')}'`);

      return new Promise((resolve) => {
        const lines: string[] = [];
        let spawnFailed = false;

        const child = spawn(command, args, {
          cwd: options.cwd,
          env: { ...process.env, ...options.env },
          stdio: ['ignore', 'pipe', 'pipe'],
        });

        const collect = (line: string): void => {
          const trimmed = line.trim();
          if (!trimmed) return;
          lines.push(trimmed);
          logger.debug({ command }, trimmed);
        };

        readline.createInterface({ input: child.stdout }).on('line', collect);
        readline.createInterface({ input: child.stderr }).on('line', collect);

        child.on('error', (error) => {
          spawnFailed = true;
          logger.debug({ command, err: error }, `Could not start '${command}'`);
          resolve({ exitCode: SPAWN_FAILURE_EXIT_CODE, lines });
        });

        child.on('close', (code) => {
          if (spawnFailed) return;
          resolve({ exitCode: code ?? 1, lines });
        });
      });
    },
  };
}
