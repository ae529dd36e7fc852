/**
 * Loads the YAML run config, fills defaults and merges in the command-line
 * values reserved for the driver (project, output, debug).
 */

import * as fs from 'node:fs';
import * as yaml from 'js-yaml';
import { ZodError } from 'zod';
import { ConfigurationError, type Logger } from '@buildrig/core';
import { configFileSchema, type BuildConfig, type ConfigFile } from './types.js';

export interface CommandLineValues {
  project: string;
  output: string;
  debug: boolean;
}

function readYaml(file: string): unknown {
  if (!fs.existsSync(file)) {
    throw new ConfigurationError(`Config file '${file}' does not exist`);
  }
  try {
    return yaml.load(fs.readFileSync(file, 'utf-8')) ?? {};
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Config file '${file}' is not valid YAML: ${detail}`);
  }
}

/**
 * Parse a config document. Values from the command line override any
 * `project`, `output` or `debug` keys in the document.
 */
export function parseConfig(document: unknown, values: CommandLineValues, source = 'config'): BuildConfig {
  let parsed: ConfigFile;
  try {
    parsed = configFileSchema.parse(document);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      );
      throw new ConfigurationError(`Invalid ${source}: ${issues.join('; ')}`, { issues });
    }
    throw error;
  }

  return {
    ...parsed,
    project: values.project,
    output: values.output,
    debug: values.debug,
  };
}

export function loadConfig(file: string, values: CommandLineValues, parentLogger: Logger): BuildConfig {
  const logger = parentLogger.child({ component: 'config' });

  if (!fs.existsSync(values.project) || !fs.statSync(values.project).isDirectory()) {
    throw new ConfigurationError(`Project directory '${values.project}' does not exist`);
  }

  const config = parseConfig(readYaml(file), values, `config file '${file}'`);

  if (!fs.existsSync(values.output)) {
    logger.warn({ output: values.output }, 'The output directory does not exist, creating it');
    fs.mkdirSync(values.output, { recursive: true });
  }

  logger.debug({ file, build: config.build, sdk: config.sdk }, 'Loaded config');
  return config;
}

/** Installation directory of the SDK, known once the driver has resolved it */
export function requireSdkPath(config: BuildConfig): string {
  if (config.sdk.path === undefined) {
    throw new ConfigurationError('SDK installation directory has not been resolved yet');
  }
  return config.sdk.path;
}
