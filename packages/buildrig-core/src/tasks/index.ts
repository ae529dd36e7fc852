export { defineTask, deriveTaskName, isTaskTypeName, noSettings, TASK_SUFFIX } from './define-task.js';
export { resolveTasks } from './task-registry.js';
export { TaskScheduler } from './task-scheduler.js';
export { STAGES } from './types.js';

export type {
  Stage,
  PipelineConfig,
  Task,
  TaskType,
  TaskPlugin,
  TaskFactory,
  TaskContext,
  TaskServices,
  SettingsSchema,
  ResolvedTask,
  TaskResolution,
  StageReport,
  ProcessRunner,
  ProcessResult,
  RunOptions,
} from './types.js';
