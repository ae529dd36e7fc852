// Task engine
export {
  defineTask,
  deriveTaskName,
  isTaskTypeName,
  noSettings,
  resolveTasks,
  TaskScheduler,
  STAGES,
  TASK_SUFFIX,
} from './tasks/index.js';

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
} from './tasks/index.js';

// File mutation primitives
export { BackupStore, BACKUP_SUFFIX } from './backup/index.js';
export type { EnsureBackupOutcome, PrepareOutcome, PreparedFile } from './backup/index.js';

export { ArchiveRewriter, rewriteArchive } from './archive/index.js';
export type { ArchiveCommitResult, ArchiveRewriterOptions } from './archive/index.js';

export { setHeaderFlag, setHeaderFlagInFile, LARGE_ADDRESS_AWARE_LAYOUT } from './binary/index.js';
export type { FlagPatchOutcome, HeaderFlagLayout } from './binary/index.js';

export { applyPatchTree, walkDir } from './patch/index.js';
export type { PatchTreeOptions, PatchTreeResult } from './patch/index.js';

// Ambient
export {
  ConfigurationError,
  TaskExecutionError,
  ArchiveEntryError,
  BinaryFormatError,
  PatchBatchError,
} from './errors.js';
export type { TaskPhase } from './errors.js';

export { createLogger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';
