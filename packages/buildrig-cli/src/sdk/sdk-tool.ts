/**
 * SdkTool - adapter over the SDK version manager CLI.
 *
 * The tool lists, installs and locates SDK versions and launches the SDK's
 * own Android build and desktop distribution entry points. Every command
 * receives `-r <registry>` first when a registry is configured.
 */

import * as path from 'node:path';
import type { Logger, ProcessResult, ProcessRunner } from '@buildrig/core';
import type { Platform, SdkSettings } from '../config/types.js';
import { ExternalToolError } from '../errors.js';

const LATEST = 'latest';
const INSTALL_LOCATION_PREFIX = 'Install Location:';

/**
 * True when `<command> --help` succeeds and prints the usage line the tool
 * is expected to print.
 */
export async function isToolInstalled(runner: ProcessRunner, command: string): Promise<boolean> {
  const result = await runner.run(command, ['--help']);
  const usage = `Usage: ${path.basename(command)}`;
  return result.exitCode === 0 && result.lines.some((line) => line.includes(usage));
}

export class SdkTool {
  private readonly runner: ProcessRunner;
  private readonly command: string;
  private readonly registry: string | null;
  private readonly logger: Logger;

  constructor(runner: ProcessRunner, settings: Pick<SdkSettings, 'command' | 'registry'>, logger: Logger) {
    this.runner = runner;
    this.command = settings.command;
    this.registry = settings.registry;
    this.logger = logger.child({ component: 'sdk-tool' });
  }

  isInstalled(): Promise<boolean> {
    return isToolInstalled(this.runner, this.command);
  }

  /** Versions installed locally */
  async listInstalled(): Promise<string[]> {
    const { lines } = await this.exec(['list']);
    return lines;
  }

  /** Every version the registry offers, newest first */
  async listAvailable(): Promise<string[]> {
    const { lines } = await this.exec(['list', '--all']);
    return lines;
  }

  /** Map 'latest' to the newest available version; anything else is returned as is */
  async resolveVersion(version: string): Promise<string> {
    if (version !== LATEST) {
      return version;
    }
    const [newest] = await this.listAvailable();
    if (newest === undefined) {
      throw new ExternalToolError(this.command, `'${this.command}' did not report any available versions`);
    }
    this.logger.info({ version: newest }, `Resolved '${LATEST}' to ${newest}`);
    return newest;
  }

  /**
   * Install `version` unless it is already installed.
   * @returns true when an install was performed
   */
  async ensureInstalled(version: string): Promise<boolean> {
    const installed = await this.listInstalled();
    if (installed.includes(version)) {
      this.logger.debug({ version }, 'SDK version already installed');
      return false;
    }
    this.logger.warn({ version }, `SDK ${version} is not installed, installing now`);
    await this.exec(['install', version]);
    return true;
  }

  /** Installation directory of an installed version */
  async installLocation(version: string): Promise<string> {
    const { lines } = await this.exec(['show', version]);
    const line = lines.find((l) => l.startsWith(INSTALL_LOCATION_PREFIX));
    const location = line?.slice(INSTALL_LOCATION_PREFIX.length).trim();
    if (!location) {
      throw new ExternalToolError(
        this.command,
        `'${this.command} show ${version}' did not report an install location`,
        { output: lines }
      );
    }
    return location;
  }

  async buildAndroid(version: string, project: string, output: string): Promise<void> {
    this.logger.info('Building Android package');
    await this.exec([
      'launch', version, '-h', 'android_build', project, 'assembleRelease', '--destination', output,
    ]);
  }

  async distribute(version: string, project: string, output: string, packages: readonly Platform[]): Promise<void> {
    const noun = packages.length === 1 ? 'package' : 'packages';
    this.logger.info({ packages }, `Building ${packages.join(', ')} ${noun}`);
    await this.exec([
      'launch', version, '-h', 'distribute', project, '--destination', output,
      ...packages.flatMap((p) => ['--package', p]),
    ]);
  }

  /** Remove the SDK's temporary build files */
  async clean(version: string): Promise<void> {
    await this.exec(['clean', version]);
  }

  private async exec(args: string[]): Promise<ProcessResult> {
    const fullArgs = this.registry !== null ? ['-r', this.registry, ...args] : args;
    const result = await this.runner.run(this.command, fullArgs);
    if (result.exitCode !== 0) {
      throw new ExternalToolError(
        this.command,
        `'${this.command} ${fullArgs.join(' ')}' exited with code ${result.exitCode}`,
        { exitCode: result.exitCode, output: result.lines.slice(-20) }
      );
    }
    return result;
  }
}
