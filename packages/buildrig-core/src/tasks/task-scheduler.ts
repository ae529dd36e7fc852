/**
 * TaskScheduler - runs resolved tasks through the two pipeline stages.
 *
 * Tasks run strictly one after another, in priority order: later tasks may
 * rely on the filesystem side effects of earlier ones. The first failure
 * stops the run; nothing after it is attempted.
 */

import type { Logger } from 'pino';
import { TaskExecutionError } from '../errors.js';
import type {
  PipelineConfig,
  ProcessRunner,
  ResolvedTask,
  Stage,
  StageReport,
  Task,
  TaskServices,
} from './types.js';

type Hook = () => void | Promise<void>;

function hookFor(task: Task, stage: Stage): Hook | undefined {
  const hook = stage === 'pre-build' ? task.preBuild : task.postBuild;
  return hook?.bind(task);
}

export class TaskScheduler<C extends PipelineConfig> {
  private readonly tasks: readonly ResolvedTask<C>[];
  private readonly config: C;
  private readonly runner: ProcessRunner;
  private readonly logger: Logger;
  private readonly taskLogger: Logger;
  /** One instance per task, created on first use and kept for the run */
  private readonly instances = new Map<string, Task>();

  constructor(
    tasks: readonly ResolvedTask<C>[],
    config: C,
    services: TaskServices
  ) {
    this.tasks = tasks;
    this.config = config;
    this.runner = services.runner;
    this.logger = services.logger.child({ component: 'task-scheduler' });
    this.taskLogger = services.logger;
  }

  /** Names of tasks instantiated so far */
  get instantiated(): string[] {
    return [...this.instances.keys()];
  }

  /**
   * Run every task's hook for `stage`.
   *
   * @throws TaskExecutionError on the first constructor or hook failure
   */
  async runStage(stage: Stage): Promise<StageReport> {
    const report: StageReport = { stage, ran: [], skipped: [] };
    this.logger.info({ stage, tasks: this.tasks.length }, `Running stage '${stage}' for active tasks`);

    for (const resolved of this.tasks) {
      const task = this.instantiate(resolved);
      const hook = hookFor(task, stage);

      if (!hook) {
        report.skipped.push(resolved.name);
        continue;
      }

      this.logger.info({ task: resolved.name, stage }, `Running '${resolved.name}'`);
      try {
        await hook();
      } catch (error) {
        this.logger.error({ task: resolved.name, stage, err: error }, `Task '${resolved.name}' failed`);
        throw new TaskExecutionError(resolved.name, stage, error);
      }
      report.ran.push(resolved.name);
    }

    return report;
  }

  private instantiate(resolved: ResolvedTask<C>): Task {
    const existing = this.instances.get(resolved.name);
    if (existing) {
      return existing;
    }

    let task: Task;
    try {
      task = resolved.create(resolved.name, this.config, {
        logger: this.taskLogger.child({ task: resolved.name }),
        runner: this.runner,
      });
    } catch (error) {
      this.logger.error({ task: resolved.name, err: error }, `Task '${resolved.name}' failed to initialize`);
      throw new TaskExecutionError(resolved.name, 'initialize', error);
    }

    this.instances.set(resolved.name, task);
    return task;
  }
}
