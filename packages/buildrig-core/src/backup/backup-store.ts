/**
 * Backup/restore protocol for files in shared, externally owned trees.
 *
 * The pristine copy of `<path>` lives beside it as `<path>.original`. It is
 * written on first mutation only and never overwritten, so every run can
 * restore it and re-apply its mutations from a clean base.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { Logger } from 'pino';

export const BACKUP_SUFFIX = '.original';

export type EnsureBackupOutcome = 'created' | 'exists' | 'missing';

export type PrepareOutcome = 'backed-up' | 'restored' | 'missing';

export interface PreparedFile {
  /** Path relative to the prepared root */
  file: string;
  outcome: PrepareOutcome;
}

export class BackupStore {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'backup-store' });
  }

  backupPathFor(filePath: string): string {
    return `${filePath}${BACKUP_SUFFIX}`;
  }

  hasBackup(filePath: string): boolean {
    return fs.existsSync(this.backupPathFor(filePath));
  }

  /**
   * Copy `filePath` to its backup unless a backup already exists.
   * A missing source is tolerated: the file may not exist for this build.
   */
  ensureBackup(filePath: string): EnsureBackupOutcome {
    if (this.hasBackup(filePath)) {
      return 'exists';
    }
    if (!fs.existsSync(filePath)) {
      this.logger.warn({ file: filePath }, 'File to back up could not be found');
      return 'missing';
    }
    fs.copyFileSync(filePath, this.backupPathFor(filePath));
    this.logger.debug({ file: filePath }, 'Created backup');
    return 'created';
  }

  /**
   * Overwrite `filePath` with its backup.
   * @returns false when there is no backup to restore
   */
  restoreFromBackup(filePath: string): boolean {
    if (!this.hasBackup(filePath)) {
      return false;
    }
    fs.copyFileSync(this.backupPathFor(filePath), filePath);
    this.logger.debug({ file: filePath }, 'Restored from backup');
    return true;
  }

  /**
   * Put the backup back in place of the mutated file, consuming the backup.
   * @returns false when there is no backup
   */
  rollback(filePath: string): boolean {
    if (!this.hasBackup(filePath)) {
      return false;
    }
    fs.rmSync(filePath, { force: true });
    fs.renameSync(this.backupPathFor(filePath), filePath);
    this.logger.debug({ file: filePath }, 'Rolled back to backup');
    return true;
  }

  /**
   * Run-start policy for declared affected files: restore files that were
   * mutated by an earlier run, back up the ones seen for the first time.
   */
  prepare(root: string, relativePaths: readonly string[]): PreparedFile[] {
    if (relativePaths.length > 0) {
      this.logger.info({ count: relativePaths.length }, 'Found affected files requiring backup');
    }

    const prepared: PreparedFile[] = [];
    for (const file of relativePaths) {
      const fullPath = path.join(root, file);

      if (!fs.existsSync(fullPath)) {
        this.logger.warn({ file }, `'${file}' could not be found`);
        prepared.push({ file, outcome: 'missing' });
        continue;
      }

      if (this.restoreFromBackup(fullPath)) {
        this.logger.info({ file }, `File '${file}' already has a backup, restored`);
        prepared.push({ file, outcome: 'restored' });
        continue;
      }

      this.ensureBackup(fullPath);
      this.logger.info({ file }, `Backed up '${file}'`);
      prepared.push({ file, outcome: 'backed-up' });
    }

    return prepared;
  }
}
