/**
 * Task resolution: turn a list of registered task plugins and a config tree
 * into an ordered, conflict-free list of tasks to run.
 *
 * Every failure here is a ConfigurationError and happens before any task
 * is instantiated.
 */

import type { Logger } from 'pino';
import { ZodError } from 'zod';
import { ConfigurationError } from '../errors.js';
import { deriveTaskName, isTaskTypeName } from './define-task.js';
import type { PipelineConfig, ResolvedTask, TaskPlugin, TaskResolution } from './types.js';

interface Candidate<C extends PipelineConfig> {
  name: string;
  plugin: TaskPlugin<C>;
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

function discover<C extends PipelineConfig>(
  plugins: readonly TaskPlugin<C>[],
  logger: Logger
): Candidate<C>[] {
  const candidates: Candidate<C>[] = [];
  const owners = new Map<string, string>();

  for (const plugin of plugins) {
    if (!isTaskTypeName(plugin.typeName)) {
      logger.debug({ typeName: plugin.typeName }, 'Skipping plugin without Task suffix');
      continue;
    }

    const name = deriveTaskName(plugin.typeName);
    const existing = owners.get(name);
    if (existing !== undefined) {
      throw new ConfigurationError(
        `Task types '${existing}' and '${plugin.typeName}' both resolve to task name '${name}'`,
        { task: name }
      );
    }
    owners.set(name, plugin.typeName);
    candidates.push({ name, plugin });
  }

  if (candidates.length === 0) {
    logger.warn('No tasks were registered');
  }

  return candidates;
}

/**
 * Resolve enabled tasks for a run.
 *
 * Validated settings are written back into `config[name]`, so later readers
 * of the config tree see the normalized subtree.
 */
export function resolveTasks<C extends PipelineConfig>(
  plugins: readonly TaskPlugin<C>[],
  config: C,
  parentLogger: Logger
): TaskResolution<C> {
  const logger = parentLogger.child({ component: 'task-registry' });
  const candidates = discover(plugins, logger);
  const tree: PipelineConfig = config;
  const toggles = tree.tasks;

  const known = new Set(candidates.map((c) => c.name));
  for (const key of Object.keys(toggles)) {
    if (!known.has(key)) {
      logger.warn({ task: key }, 'Config enables a task that is not registered, ignoring');
    }
  }

  const enabled: Candidate<C>[] = [];
  for (const candidate of candidates) {
    const value = toggles[candidate.name];
    if (value === undefined) {
      logger.info({ task: candidate.name }, 'Task not defined in config, assuming disabled');
      continue;
    }
    if (typeof value !== 'boolean') {
      throw new ConfigurationError(
        `'tasks.${candidate.name}' must be true or false, got '${String(value)}'`,
        { task: candidate.name }
      );
    }
    logger.info({ task: candidate.name, enabled: value }, value ? 'Task enabled' : 'Task disabled');
    if (value) {
      enabled.push(candidate);
    }
  }

  const tasks: ResolvedTask<C>[] = [];
  const affectedFiles: string[] = [];
  const fileOwners = new Map<string, string>();

  for (const { name, plugin } of enabled) {
    let configured: ReturnType<TaskPlugin<C>['configure']>;
    try {
      configured = plugin.configure(tree[name] ?? {});
    } catch (error) {
      if (error instanceof ZodError) {
        const issues = formatIssues(error);
        throw new ConfigurationError(
          `Task '${name}' failed to validate its config section: ${issues.join('; ')}`,
          { task: name, issues }
        );
      }
      throw error;
    }
    if (configured.settings !== undefined) {
      tree[name] = configured.settings;
    }

    for (const file of plugin.affectedFiles) {
      const owner = fileOwners.get(file);
      if (owner !== undefined) {
        throw new ConfigurationError(
          `Task '${name}' specifies affected file '${file}' which is already specified by task '${owner}'`,
          { task: name }
        );
      }
      fileOwners.set(file, name);
      affectedFiles.push(file);
    }

    tasks.push({
      name,
      typeName: plugin.typeName,
      priority: plugin.priority,
      affectedFiles: plugin.affectedFiles,
      create: configured.create,
    });
  }

  // Array.prototype.sort is stable: equal priorities keep registration order
  tasks.sort((a, b) => b.priority - a.priority);

  logger.debug(
    { order: tasks.map((t) => `${t.name}(${t.priority})`), affectedFiles },
    'Resolved task order'
  );

  return { tasks, affectedFiles };
}
