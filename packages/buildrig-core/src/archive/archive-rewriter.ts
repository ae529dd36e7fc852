/**
 * ArchiveRewriter - transactional add/replace/delete of entries in an
 * existing zip archive.
 *
 * Writes to entries that already exist are staged into a temporary staging
 * directory, one file per entry name. Writes to new names are queued as
 * appends. `commit()` rebuilds the archive from the original into a
 * temporary file beside it and renames that over the original only once it
 * is completely written, so the original is either fully replaced or left
 * untouched.
 *
 * Any staged change triggers a full rebuild, appends included: new entries
 * are never written into the existing file in place. The rebuilt archive is
 * assembled in memory (adm-zip `toBuffer`) before it is written, so a commit
 * holds the whole archive in memory once.
 */

import { randomBytes } from 'node:crypto';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import AdmZip from 'adm-zip';
import type { Logger } from 'pino';
import { ArchiveEntryError } from '../errors.js';

/** Marks an entry for removal in the rebuilt archive */
const DELETE_MARKER = Symbol('delete');

type StagedReplacement = string | typeof DELETE_MARKER;

export interface ArchiveCommitResult {
  /** False when nothing was staged and the archive was left untouched */
  rebuilt: boolean;
  replaced: string[];
  removed: string[];
  added: string[];
}

export interface ArchiveRewriterOptions {
  logger?: Logger;
  /** Parent directory for staging files (default: os.tmpdir()) */
  stagingRoot?: string;
}

export class ArchiveRewriter {
  readonly archivePath: string;
  private readonly zip: AdmZip;
  private readonly originalNames: string[];
  private readonly replacements = new Map<string, StagedReplacement>();
  private readonly additions = new Map<string, string>();
  private readonly stagingRoot: string;
  private readonly logger: Logger | undefined;
  private stagingDir: string | null = null;
  private stagedCount = 0;
  private closed = false;

  private constructor(archivePath: string, options: ArchiveRewriterOptions) {
    this.archivePath = archivePath;
    // noSort keeps entries in archive order on rebuild
    this.zip = new AdmZip(archivePath, { noSort: true });
    this.originalNames = this.zip.getEntries().map((entry) => entry.entryName);
    this.stagingRoot = options.stagingRoot ?? os.tmpdir();
    this.logger = options.logger?.child({ component: 'archive-rewriter', archive: archivePath });
  }

  /** Open an existing archive in update mode */
  static open(archivePath: string, options: ArchiveRewriterOptions = {}): ArchiveRewriter {
    return new ArchiveRewriter(archivePath, options);
  }

  /** Entry names of the original archive, in archive order */
  entryNames(): string[] {
    return [...this.originalNames];
  }

  /** True if `name` is readable: an original entry not staged for removal, or a pending append */
  has(name: string): boolean {
    if (this.additions.has(name)) return true;
    return this.originalNames.includes(name) && this.replacements.get(name) !== DELETE_MARKER;
  }

  /** Current content of an entry, staged bytes taking precedence */
  read(name: string): Buffer {
    this.assertOpen();
    const staged = this.replacements.get(name) ?? this.additions.get(name);
    if (staged === DELETE_MARKER) {
      throw new ArchiveEntryError(this.archivePath, [name], `Entry '${name}' is staged for removal`);
    }
    if (staged !== undefined) {
      return fs.readFileSync(staged);
    }
    const entry = this.zip.getEntry(name);
    if (!entry || entry.isDirectory) {
      throw new ArchiveEntryError(this.archivePath, [name]);
    }
    return entry.getData();
  }

  /**
   * Write an entry. Existing names are staged as replacements (the last
   * write wins); new names are appended on commit.
   */
  write(name: string, data: Buffer | string): void {
    this.assertOpen();
    const content = typeof data === 'string' ? Buffer.from(data, 'utf-8') : data;

    if (this.originalNames.includes(name)) {
      const current = this.replacements.get(name);
      const target = typeof current === 'string' ? current : this.nextStagingFile();
      fs.writeFileSync(target, content);
      this.replacements.set(name, target);
      return;
    }

    const target = this.additions.get(name) ?? this.nextStagingFile();
    fs.writeFileSync(target, content);
    this.additions.set(name, target);
  }

  /** Write an entry from a file on disk */
  writeFile(name: string, sourcePath: string): void {
    this.write(name, fs.readFileSync(sourcePath));
  }

  /** Stage the removal of an existing entry */
  remove(name: string): void {
    this.assertOpen();
    if (this.additions.has(name)) {
      this.additions.delete(name);
      return;
    }
    if (!this.originalNames.includes(name)) {
      throw new ArchiveEntryError(this.archivePath, [name]);
    }
    this.replacements.set(name, DELETE_MARKER);
  }

  /**
   * Rebuild the archive with every staged change and atomically replace the
   * original. Staging files are released whether or not this succeeds.
   */
  commit(): ArchiveCommitResult {
    this.assertOpen();
    const result: ArchiveCommitResult = { rebuilt: false, replaced: [], removed: [], added: [] };

    try {
      if (this.replacements.size === 0 && this.additions.size === 0) {
        return result;
      }

      for (const name of this.originalNames) {
        const staged = this.replacements.get(name);
        if (staged === undefined) continue;

        if (staged === DELETE_MARKER) {
          this.zip.deleteFile(name);
          result.removed.push(name);
          continue;
        }

        const entry = this.zip.getEntry(name);
        if (!entry) {
          throw new ArchiveEntryError(this.archivePath, [name]);
        }
        const { method, time } = entry.header;
        this.zip.updateFile(entry, fs.readFileSync(staged));
        entry.header.method = method;
        entry.header.time = time;
        result.replaced.push(name);
      }

      for (const [name, staged] of this.additions) {
        this.zip.addFile(name, fs.readFileSync(staged));
        result.added.push(name);
      }

      this.replaceArchive(this.zip.toBuffer());
      result.rebuilt = true;

      this.logger?.debug(
        { replaced: result.replaced, removed: result.removed, added: result.added },
        'Archive rebuilt'
      );
      return result;
    } finally {
      this.release();
    }
  }

  /** Drop every staged change and leave the archive untouched */
  discard(): void {
    if (this.closed) return;
    this.release();
  }

  private replaceArchive(content: Buffer): void {
    const dir = path.dirname(this.archivePath);
    const tmp = path.join(
      dir,
      `.${path.basename(this.archivePath)}.${randomBytes(4).toString('hex')}.rebuild`
    );

    try {
      const fd = fs.openSync(tmp, 'w');
      try {
        fs.writeSync(fd, content);
        fs.fsyncSync(fd);
      } finally {
        fs.closeSync(fd);
      }
      fs.renameSync(tmp, this.archivePath);
    } catch (error) {
      fs.rmSync(tmp, { force: true });
      throw error;
    }
  }

  private nextStagingFile(): string {
    if (this.stagingDir === null) {
      this.stagingDir = fs.mkdtempSync(path.join(this.stagingRoot, 'buildrig-archive-'));
    }
    this.stagedCount += 1;
    return path.join(this.stagingDir, `${this.stagedCount}.bin`);
  }

  private release(): void {
    this.closed = true;
    this.replacements.clear();
    this.additions.clear();
    if (this.stagingDir !== null) {
      fs.rmSync(this.stagingDir, { recursive: true, force: true });
      this.stagingDir = null;
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error(`Archive rewriter for '${this.archivePath}' is already closed`);
    }
  }
}

/**
 * Open `archivePath`, let `fn` stage changes, then commit.
 * When `fn` throws, staged changes are discarded and the archive is untouched.
 */
export async function rewriteArchive<T>(
  archivePath: string,
  fn: (rewriter: ArchiveRewriter) => T | Promise<T>,
  options: ArchiveRewriterOptions = {}
): Promise<{ value: T; commit: ArchiveCommitResult }> {
  const rewriter = ArchiveRewriter.open(archivePath, options);
  let value: T;
  try {
    value = await fn(rewriter);
  } catch (error) {
    rewriter.discard();
    throw error;
  }
  return { value, commit: rewriter.commit() };
}
