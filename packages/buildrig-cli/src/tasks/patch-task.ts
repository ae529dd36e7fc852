import * as fs from 'node:fs';
import { z } from 'zod';
import { applyPatchTree, BackupStore, type Task, type TaskContext } from '@buildrig/core';
import type { BuildConfig } from '../config/types.js';
import { requireSdkPath } from '../config/loader.js';
import { expandPath } from '../utils/env.js';

const patchSettings = z
  .object({
    path: z.string({ required_error: "Field 'path' missing" }).min(1),
  })
  .transform((settings) => ({ path: expandPath(settings.path) }))
  .refine(
    (settings) => fs.existsSync(settings.path) && fs.statSync(settings.path).isDirectory(),
    (settings) => ({ message: `Directory '${settings.path}' does not exist`, path: ['path'] })
  );

export type PatchSettings = z.output<typeof patchSettings>;

/**
 * Applies the patch tree at `patch.path` onto the installed SDK before the
 * build. Patch files mirror the SDK layout.
 */
export class PatchTask implements Task {
  static readonly PRIORITY = 1000;
  static readonly configSchema = patchSettings;

  constructor(
    readonly name: string,
    private readonly config: BuildConfig,
    private readonly context: TaskContext<PatchSettings>
  ) {}

  preBuild(): void {
    const { logger, settings } = this.context;
    applyPatchTree({
      patchDir: settings.path,
      targetRoot: requireSdkPath(this.config),
      backups: new BackupStore(logger),
      logger,
    });
  }
}
