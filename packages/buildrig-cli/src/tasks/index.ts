import { defineTask, type TaskPlugin } from '@buildrig/core';
import type { BuildConfig } from '../config/types.js';
import { CleanTask } from './clean-task.js';
import { NotarizeTask } from './notarize-task.js';
import { OverwriteKeystoreTask } from './overwrite-keystore-task.js';
import { PatchTask } from './patch-task.js';
import { SetExtendedMemoryLimitTask } from './set-extended-memory-limit-task.js';

export { CleanTask, NotarizeTask, OverwriteKeystoreTask, PatchTask, SetExtendedMemoryLimitTask };
export { findExecutables } from './set-extended-memory-limit-task.js';
export { KEYSTORE_ENV, KEYSTORE_FILE } from './overwrite-keystore-task.js';

/** Tasks shipped with the CLI, in registration order */
export const BUILTIN_TASKS: readonly TaskPlugin<BuildConfig>[] = [
  defineTask(PatchTask),
  defineTask(OverwriteKeystoreTask),
  defineTask(SetExtendedMemoryLimitTask),
  defineTask(NotarizeTask),
  defineTask(CleanTask),
];
