import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import type { Task, TaskContext } from '@buildrig/core';
import type { BuildConfig } from '../config/types.js';
import { requireSdkPath } from '../config/loader.js';
import { getEnv } from '../utils/env.js';

export const KEYSTORE_ENV = 'BUILDRIG_KEYSTORE';
export const KEYSTORE_FILE = 'rapt/android.keystore';

const BASE64 = /^[A-Za-z0-9+/]+={0,2}$/;

const keystoreSettings = z
  .object({
    keystore: z.string().optional(),
  })
  .transform((settings, ctx) => {
    const encoded = (settings.keystore ?? getEnv(KEYSTORE_ENV))?.replace(/\s+/g, '');
    if (encoded === undefined || encoded === '') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['keystore'],
        message:
          `The overwrite_keystore task is active, but no keystore was specified. ` +
          `Set the 'keystore' option or the ${KEYSTORE_ENV} environment variable`,
      });
      return z.NEVER;
    }
    if (encoded.length % 4 !== 0 || !BASE64.test(encoded)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['keystore'],
        message: 'Keystore is not valid base64',
      });
      return z.NEVER;
    }
    return { keystore: Buffer.from(encoded, 'base64') };
  });

export type KeystoreSettings = z.output<typeof keystoreSettings>;

/** Replaces the SDK's default Android signing keystore */
export class OverwriteKeystoreTask implements Task {
  static readonly AFFECTED_FILES = [KEYSTORE_FILE];
  static readonly configSchema = keystoreSettings;

  constructor(
    readonly name: string,
    private readonly config: BuildConfig,
    private readonly context: TaskContext<KeystoreSettings>
  ) {}

  preBuild(): void {
    const target = path.join(requireSdkPath(this.config), KEYSTORE_FILE);
    this.context.logger.info({ target }, 'Overwriting default keystore with custom one');
    fs.writeFileSync(target, this.context.settings.keystore);
  }
}
