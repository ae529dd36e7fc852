import { z } from 'zod';
import { STAGES } from './types.js';
import type { PipelineConfig, SettingsSchema, Stage, Task, TaskPlugin, TaskType } from './types.js';

export const TASK_SUFFIX = 'Task';

/** Schema for tasks that take no settings: accepts any subtree, yields undefined */
export const noSettings: SettingsSchema<undefined> = z.unknown().transform(() => undefined);

/**
 * Derive a task's runtime name from its type name.
 *
 * FooBarTask -> foo_bar, SetExtendedMemoryLimitTask -> set_extended_memory_limit
 */
export function deriveTaskName(typeName: string): string {
  const base = typeName.endsWith(TASK_SUFFIX) ? typeName.slice(0, -TASK_SUFFIX.length) : typeName;
  return base
    .split(/(?=[A-Z])/)
    .filter((part) => part.length > 0)
    .map((part) => part.toLowerCase())
    .join('_');
}

export function isTaskTypeName(typeName: string): boolean {
  return typeName.length > TASK_SUFFIX.length && typeName.endsWith(TASK_SUFFIX);
}

function hasHook(prototype: Task, stage: Stage): boolean {
  const hook = stage === 'pre-build' ? prototype.preBuild : prototype.postBuild;
  return typeof hook === 'function';
}

/**
 * Build the registration record for a task class.
 * Settings are parsed once, in `configure`, and captured by the factory.
 */
export function defineTask<S, C extends PipelineConfig>(type: TaskType<S, C>): TaskPlugin<C> {
  return {
    typeName: type.name,
    priority: type.PRIORITY ?? 0,
    affectedFiles: type.AFFECTED_FILES ?? [],
    stages: STAGES.filter((stage) => hasHook(type.prototype, stage)),
    configure(section) {
      const settings = type.configSchema.parse(section);
      return {
        settings,
        create: (name, config, services) => new type(name, config, { ...services, settings }),
      };
    },
  };
}
