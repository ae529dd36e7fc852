/**
 * buildrig build - run the full pipeline for one project
 */

import * as path from 'node:path';
import { Command } from 'commander';
import { createLogger } from '@buildrig/core';
import { loadConfig } from '../config/loader.js';
import { runPipeline } from '../pipeline.js';
import { createProcessRunner } from '../utils/process-runner.js';
import { failure, success } from '../utils/ui.js';

interface BuildOptions {
  input: string;
  output: string;
  config: string;
  debug?: boolean;
}

export function registerBuildCommand(program: Command): void {
  program
    .command('build')
    .description('Build the project for every enabled platform, running pre- and post-build tasks')
    .requiredOption('-i, --input <dir>', 'The project directory to build')
    .requiredOption('-o, --output <dir>', 'The directory to write build artifacts to')
    .requiredOption('-c, --config <file>', 'The configuration file for this run')
    .option('-d, --debug', 'Show debug output, including external tool output')
    .action(async (options: BuildOptions) => {
      const debug = options.debug === true;
      const logger = createLogger({ level: debug ? 'debug' : 'info' });

      try {
        const config = loadConfig(
          path.resolve(options.config),
          { project: path.resolve(options.input), output: path.resolve(options.output), debug },
          logger
        );
        const result = await runPipeline({ config, runner: createProcessRunner(logger), logger });
        success(`Built ${result.built.join(', ') || 'nothing'} with SDK ${result.sdkVersion}`);
      } catch (error) {
        logger.error({ err: error }, 'Build failed');
        failure(error instanceof Error ? error.message : String(error));
        process.exit(1);
      }
    });
}
