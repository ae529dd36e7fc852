/**
 * Apply a directory tree of text patches onto a matching tree of targets,
 * all or nothing.
 *
 * Each patch file `<patchDir>/<rel>` targets `<targetRoot>/<rel>` and is in
 * diff-match-patch patch format. Every target is reset to its pristine
 * backup before patching, so reruns apply against the same base. If any
 * patch fails to parse or apply, every target touched in the batch is
 * rolled back and the batch fails.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import DiffMatchPatch from 'diff-match-patch';
import type { Logger } from 'pino';
import type { BackupStore } from '../backup/backup-store.js';
import { PatchBatchError } from '../errors.js';

export interface PatchTreeOptions {
  /** Directory holding the patch files */
  patchDir: string;
  /** Directory holding the files to patch */
  targetRoot: string;
  backups: BackupStore;
  logger: Logger;
}

export interface PatchTreeResult {
  /** Relative paths of the patched targets */
  applied: string[];
}

/**
 * Recursively list files under `rootDir`, as sorted forward-slash paths
 * relative to it. Symlinks and special files are skipped.
 */
export function walkDir(rootDir: string, subDir: string = ''): string[] {
  const results: string[] = [];
  const absDir = subDir ? path.join(rootDir, subDir) : rootDir;

  const entries = fs.readdirSync(absDir, { withFileTypes: true });
  for (const entry of entries) {
    const relativePath = subDir ? `${subDir}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      results.push(...walkDir(rootDir, relativePath));
    } else if (entry.isFile()) {
      results.push(relativePath);
    }
  }

  return results.sort();
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function applyPatchTree(options: PatchTreeOptions): PatchTreeResult {
  const { patchDir, targetRoot, backups } = options;
  const logger = options.logger.child({ component: 'patch-applier' });
  const dmp = new DiffMatchPatch();

  const patchFiles = walkDir(patchDir);
  logger.debug(
    { patchDir, count: patchFiles.length },
    `Found ${patchFiles.length} patch file${patchFiles.length !== 1 ? 's' : ''}`
  );

  const errors = new Set<string>();
  const touched: string[] = [];
  const applied: string[] = [];

  for (const relativePath of patchFiles) {
    const patchFile = path.join(patchDir, relativePath);
    const targetFile = path.join(targetRoot, relativePath);

    if (!fs.existsSync(targetFile) && !backups.hasBackup(targetFile)) {
      logger.error({ patch: relativePath, target: targetFile }, 'Patch target does not exist');
      errors.add(relativePath);
      continue;
    }

    const hadBackup = backups.hasBackup(targetFile);
    try {
      if (hadBackup) {
        backups.restoreFromBackup(targetFile);
        logger.debug({ target: relativePath }, 'Original found, restored it before patching');
      } else {
        backups.ensureBackup(targetFile);
      }
    } catch (error) {
      logger.error({ patch: relativePath, error: errorMessage(error) }, 'Failed to back up patch target');
      errors.add(relativePath);
      if (hadBackup) {
        touched.push(targetFile);
      } else {
        // a partial copy must not pass for a pristine backup on the next run
        fs.rmSync(backups.backupPathFor(targetFile), { force: true });
      }
      continue;
    }
    touched.push(targetFile);

    let patches: ReturnType<DiffMatchPatch['patch_fromText']>;
    try {
      patches = dmp.patch_fromText(fs.readFileSync(patchFile, 'utf-8'));
    } catch (error) {
      logger.error({ patch: relativePath, error: errorMessage(error) }, 'Failed to parse patch file');
      errors.add(relativePath);
      continue;
    }

    try {
      const [patched, hunks] = dmp.patch_apply(patches, fs.readFileSync(targetFile, 'utf-8'));
      const failedHunks = hunks.filter((ok) => !ok).length;
      if (failedHunks > 0) {
        logger.error(
          { patch: relativePath, failedHunks, totalHunks: hunks.length },
          'Failed to apply patch to file'
        );
        errors.add(relativePath);
        continue;
      }
      fs.writeFileSync(targetFile, patched, 'utf-8');
      applied.push(relativePath);
    } catch (error) {
      logger.error({ patch: relativePath, error: errorMessage(error) }, 'Failed to apply patch to file');
      errors.add(relativePath);
    }
  }

  if (errors.size > 0) {
    for (const targetFile of touched) {
      backups.rollback(targetFile);
    }
    logger.error({ failed: [...errors], rolledBack: touched.length }, 'Patching failed, rolled back all changes');
    throw new PatchBatchError([...errors]);
  }

  logger.info({ applied: applied.length }, 'Applied all patches');
  return { applied };
}
