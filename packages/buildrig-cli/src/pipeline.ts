/**
 * Pipeline driver: resolve tasks, prepare the SDK, run the pre-build stage,
 * build every enabled platform, run the post-build stage.
 *
 * Every failure propagates. Nothing here exits the process.
 */

import {
  BackupStore,
  resolveTasks,
  TaskScheduler,
  type Logger,
  type ProcessRunner,
  type StageReport,
  type TaskPlugin,
} from '@buildrig/core';
import type { BuildConfig, Platform } from './config/types.js';
import { ExternalToolError } from './errors.js';
import { isToolInstalled, SdkTool } from './sdk/sdk-tool.js';
import { BUILTIN_TASKS } from './tasks/index.js';
import { withGroup } from './utils/ci.js';

export interface PipelineOptions {
  config: BuildConfig;
  /** Task plugins to resolve (default: BUILTIN_TASKS) */
  plugins?: readonly TaskPlugin<BuildConfig>[];
  runner: ProcessRunner;
  logger: Logger;
}

export interface PipelineResult {
  /** Enabled tasks in run order */
  tasks: string[];
  sdkVersion: string;
  sdkPath: string;
  /** Platforms that were built */
  built: Platform[];
  stages: StageReport[];
}

const DESKTOP_PLATFORMS: readonly Platform[] = ['pc', 'mac'];

export async function runPipeline(options: PipelineOptions): Promise<PipelineResult> {
  const { config, runner } = options;
  const logger = options.logger.child({ component: 'pipeline' });
  const plugins = options.plugins ?? BUILTIN_TASKS;

  const { tasks, affectedFiles } = resolveTasks(plugins, config, options.logger);
  const taskNames = tasks.map((t) => t.name);
  logger.info({ tasks: taskNames }, `Loaded ${tasks.length} active task${tasks.length !== 1 ? 's' : ''}`);

  const sdk = new SdkTool(runner, config.sdk, options.logger);
  if (!(await sdk.isInstalled())) {
    throw new ExternalToolError(config.sdk.command, `Please install '${config.sdk.command}' before continuing`);
  }
  if (taskNames.includes('notarize') && !(await isToolInstalled(runner, config.notarizer.command))) {
    throw new ExternalToolError(
      config.notarizer.command,
      `Please install '${config.notarizer.command}' before continuing`
    );
  }

  const sdkPath = await withGroup('Prepare SDK', async () => {
    logger.info('Checking available SDK versions');
    config.sdk.version = await sdk.resolveVersion(config.sdk.version);
    await sdk.ensureInstalled(config.sdk.version);
    const location = await sdk.installLocation(config.sdk.version);
    config.sdk.path = location;
    logger.info({ version: config.sdk.version, path: location }, 'Using SDK');
    return location;
  });

  new BackupStore(options.logger).prepare(sdkPath, affectedFiles);

  const scheduler = new TaskScheduler(tasks, config, { logger: options.logger, runner });
  const stages: StageReport[] = [];

  if (tasks.length > 0) {
    stages.push(await withGroup('Pre-Build Tasks', () => scheduler.runStage('pre-build')));
  }

  const built: Platform[] = [];
  if (config.build.android) {
    await withGroup('Build Android', () => sdk.buildAndroid(config.sdk.version, config.project, config.output));
    built.push('android');
  }

  const desktop = DESKTOP_PLATFORMS.filter((platform) => config.build[platform]);
  if (desktop.length > 0) {
    await withGroup(`Build ${desktop.join(', ')}`, () =>
      sdk.distribute(config.sdk.version, config.project, config.output, desktop)
    );
    built.push(...desktop);
  }

  if (tasks.length > 0) {
    stages.push(await withGroup('Post-Build Tasks', () => scheduler.runStage('post-build')));
  }

  return { tasks: taskNames, sdkVersion: config.sdk.version, sdkPath, built, stages };
}

export { loadConfig, parseConfig, requireSdkPath } from './config/loader.js';
export type { CommandLineValues } from './config/loader.js';
export { configFileSchema } from './config/types.js';
export type { BuildConfig, Platform, SdkSettings, NotarizerSettings } from './config/types.js';
export { ExternalToolError } from './errors.js';
export { SdkTool, isToolInstalled } from './sdk/sdk-tool.js';
export { BUILTIN_TASKS } from './tasks/index.js';
export { createProcessRunner } from './utils/process-runner.js';
