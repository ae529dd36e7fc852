/**
 * Error types raised by the task engine and the file mutation primitives.
 *
 * Everything here is fatal to a run. The CLI is the only place that turns
 * these into an exit status.
 */

import type { Stage } from './tasks/types.js';

// ─── Configuration ──────────────────────────────────────────────────

/**
 * Bad or missing task configuration, a non-boolean `tasks.<name>` value,
 * or two tasks declaring the same affected file. Always raised before any
 * task runs.
 */
export class ConfigurationError extends Error {
  public readonly task: string | undefined;
  public readonly issues: string[];

  constructor(message: string, options: { task?: string; issues?: string[] } = {}) {
    super(message);
    this.name = 'ConfigurationError';
    this.task = options.task;
    this.issues = options.issues ?? [];
  }
}

// ─── Task execution ─────────────────────────────────────────────────

export type TaskPhase = 'initialize' | Stage;

export class TaskExecutionError extends Error {
  public readonly task: string;
  public readonly phase: TaskPhase;

  constructor(task: string, phase: TaskPhase, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    const action = phase === 'initialize' ? 'failed to initialize' : `failed during ${phase}`;
    super(`Task '${task}' ${action}: ${detail}`, { cause });
    this.name = 'TaskExecutionError';
    this.task = task;
    this.phase = phase;
  }
}

// ─── Archives ───────────────────────────────────────────────────────

export class ArchiveEntryError extends Error {
  public readonly archivePath: string;
  public readonly entries: string[];

  constructor(archivePath: string, entries: string[], message?: string) {
    super(message ?? `Archive '${archivePath}' is missing entries: ${entries.join(', ')}`);
    this.name = 'ArchiveEntryError';
    this.archivePath = archivePath;
    this.entries = entries;
  }
}

// ─── Executables ────────────────────────────────────────────────────

export class BinaryFormatError extends Error {
  public readonly file: string;

  constructor(file: string, reason: string) {
    super(`${reason} in '${file}'`);
    this.name = 'BinaryFormatError';
    this.file = file;
  }
}

// ─── Patches ────────────────────────────────────────────────────────

export class PatchBatchError extends Error {
  public readonly failedPatches: string[];

  constructor(failedPatches: string[]) {
    super(
      `Failed to apply ${failedPatches.length} patch file${failedPatches.length !== 1 ? 's' : ''}, ` +
        `rolled back all changes: ${failedPatches.join(', ')}`
    );
    this.name = 'PatchBatchError';
    this.failedPatches = failedPatches;
  }
}
