import * as fs from 'node:fs';
import * as path from 'node:path';
import { noSettings, type Task, type TaskContext } from '@buildrig/core';
import type { BuildConfig } from '../config/types.js';
import { SdkTool } from '../sdk/sdk-tool.js';

const KEPT_APK_SUFFIX = '-universal-release.apk';

/**
 * Runs last: removes the SDK's temporary build files and every APK in the
 * output directory except the universal release build.
 */
export class CleanTask implements Task {
  static readonly PRIORITY = -1000;
  static readonly configSchema = noSettings;

  constructor(
    readonly name: string,
    private readonly config: BuildConfig,
    private readonly context: TaskContext<undefined>
  ) {}

  async postBuild(): Promise<void> {
    const { logger, runner } = this.context;
    const sdk = new SdkTool(runner, this.config.sdk, logger);
    await sdk.clean(this.config.sdk.version);

    const unused = fs
      .readdirSync(this.config.output)
      .filter((file) => file.endsWith('.apk') && !file.endsWith(KEPT_APK_SUFFIX));
    for (const file of unused) {
      fs.rmSync(path.join(this.config.output, file), { force: true });
    }
    logger.info({ removed: unused }, `Removed ${unused.length} unused APK${unused.length !== 1 ? 's' : ''}`);
  }
}
