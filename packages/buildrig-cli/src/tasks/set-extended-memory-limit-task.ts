/**
 * Marks the Windows executables inside the pc distribution archive as
 * large-address-aware, so the 32-bit interpreter can use more than 2 GB.
 *
 * Three entries are patched: the launcher at the archive root, its twin
 * under lib/windows-i686 and the bundled pythonw.exe.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import {
  ArchiveEntryError,
  noSettings,
  rewriteArchive,
  setHeaderFlag,
  type Task,
  type TaskContext,
} from '@buildrig/core';
import type { BuildConfig } from '../config/types.js';

const WINDOWS_LIB_DIR = 'lib/windows-i686';

/** Archive entries to patch, in patch order */
export function findExecutables(archivePath: string, entryNames: readonly string[]): string[] {
  const files = entryNames.filter((name) => !name.endsWith('/'));
  const roots = new Set(files.map((name) => name.split('/')[0]));
  const root = roots.size === 1 ? [...roots][0] : undefined;

  const mainExe = files.find((name) => {
    const parts = name.split('/');
    return parts.length === 2 && parts[0] === root && path.extname(name).toLowerCase() === '.exe';
  });

  const expected = new Map<string, string | undefined>([
    ['main executable', mainExe],
    [
      'main executable twin',
      mainExe !== undefined ? `${root}/${WINDOWS_LIB_DIR}/${path.posix.basename(mainExe)}` : undefined,
    ],
    ['pythonw.exe', root !== undefined ? `${root}/${WINDOWS_LIB_DIR}/pythonw.exe` : undefined],
  ]);

  const found: string[] = [];
  const missing: string[] = [];
  for (const [label, name] of expected) {
    if (name !== undefined && files.includes(name)) {
      found.push(name);
    } else {
      missing.push(name ?? label);
    }
  }

  if (missing.length > 0) {
    throw new ArchiveEntryError(
      archivePath,
      missing,
      `Could not find executables to patch in '${archivePath}': ${missing.join(', ')}`
    );
  }
  return found;
}

export class SetExtendedMemoryLimitTask implements Task {
  static readonly configSchema = noSettings;

  constructor(
    readonly name: string,
    private readonly config: BuildConfig,
    private readonly context: TaskContext<undefined>
  ) {}

  async postBuild(): Promise<void> {
    const { logger } = this.context;
    if (!this.config.build.pc) {
      logger.info('pc build is disabled, nothing to patch');
      return;
    }

    const [archive] = fs
      .readdirSync(this.config.output)
      .filter((file) => file.endsWith('-pc.zip'))
      .sort();
    if (archive === undefined) {
      throw new Error(`No '*-pc.zip' archive found in '${this.config.output}'`);
    }
    const archivePath = path.join(this.config.output, archive);

    const { commit } = await rewriteArchive(
      archivePath,
      (rewriter) => {
        for (const entry of findExecutables(archivePath, rewriter.entryNames())) {
          const { outcome, data } = setHeaderFlag(rewriter.read(entry), entry);
          if (outcome === 'set') {
            logger.info({ entry }, `Setting LAA flag for '${entry}'`);
            rewriter.write(entry, data);
          } else {
            logger.info({ entry }, `LAA flag was already set for '${entry}', skipping`);
          }
        }
      },
      { logger }
    );
    logger.debug({ archive: archivePath, rebuilt: commit.rebuilt }, 'Finished patching archive');
  }
}
