/**
 * Types for the task engine.
 *
 * A task is a class named `<Something>Task`. Its static side declares
 * priority, affected files and a settings schema; its instance side
 * optionally implements one hook per stage.
 */

import type { Logger } from 'pino';
import type { z } from 'zod';

/** Pipeline stage, relative to the external build step */
export type Stage = 'pre-build' | 'post-build';

export const STAGES: readonly Stage[] = ['pre-build', 'post-build'] as const;

/**
 * The config tree handed to every task.
 * `tasks.<name>` toggles a task; `<name>` holds that task's subtree.
 */
export interface PipelineConfig {
  tasks: Record<string, unknown>;
  [section: string]: unknown;
}

/** Instance side of a task. Each hook is optional. */
export interface Task {
  readonly name: string;
  preBuild?(): void | Promise<void>;
  postBuild?(): void | Promise<void>;
}

// ─── External processes ─────────────────────────────────────────────

export interface RunOptions {
  cwd?: string;
  /** Extra environment variables */
  env?: Record<string, string>;
}

export interface ProcessResult {
  exitCode: number;
  /** Non-empty output lines, stdout and stderr merged */
  lines: string[];
}

/** Runs an external command to completion. No deadline is enforced. */
export interface ProcessRunner {
  run(command: string, args: string[], options?: RunOptions): Promise<ProcessResult>;
}

// ─── Task contract ──────────────────────────────────────────────────

/** Collaborators injected into every task instance */
export interface TaskServices {
  logger: Logger;
  runner: ProcessRunner;
}

export interface TaskContext<S> extends TaskServices {
  /** Output of the task's `configSchema` */
  settings: S;
}

/**
 * Validation hook: maps a raw config subtree to typed settings.
 * May normalize (decode, fill defaults, expand paths) or reject.
 */
export type SettingsSchema<S> = z.ZodType<S, z.ZodTypeDef, unknown>;

/** Static side of a task class */
export interface TaskType<S, C extends PipelineConfig> {
  readonly name: string;
  /** Higher runs earlier (default: 0) */
  readonly PRIORITY?: number;
  /** Paths relative to the SDK root that this task mutates */
  readonly AFFECTED_FILES?: readonly string[];
  readonly configSchema: SettingsSchema<S>;
  readonly prototype: Task;
  new (name: string, config: C, context: TaskContext<S>): Task;
}

export type TaskFactory<C extends PipelineConfig> = (
  name: string,
  config: C,
  services: TaskServices
) => Task;

/** Registration record for one task type */
export interface TaskPlugin<C extends PipelineConfig> {
  readonly typeName: string;
  readonly priority: number;
  readonly affectedFiles: readonly string[];
  /** Stages the task has a hook for */
  readonly stages: readonly Stage[];
  /** Validates a raw subtree; throws a ZodError on rejection */
  configure(section: unknown): { settings: unknown; create: TaskFactory<C> };
}

/** An enabled, validated task ready to be scheduled */
export interface ResolvedTask<C extends PipelineConfig> {
  name: string;
  typeName: string;
  priority: number;
  affectedFiles: readonly string[];
  create: TaskFactory<C>;
}

export interface TaskResolution<C extends PipelineConfig> {
  /** Enabled tasks, highest priority first */
  tasks: ResolvedTask<C>[];
  /** Affected files of all enabled tasks, in resolution order */
  affectedFiles: string[];
}

export interface StageReport {
  stage: Stage;
  /** Tasks whose hook for this stage ran */
  ran: string[];
  /** Tasks without a hook for this stage */
  skipped: string[];
}
