import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import type { Task, TaskContext } from '@buildrig/core';
import type { BuildConfig } from '../config/types.js';
import { ExternalToolError } from '../errors.js';

/** The notarizer's own config, passed through verbatim */
const notarizeSettings = z.record(z.string(), z.unknown());

export type NotarizeSettings = z.output<typeof notarizeSettings>;

/**
 * Runs the notarization tool against the mac distribution archive.
 * The task's config subtree is written out as the tool's YAML config.
 */
export class NotarizeTask implements Task {
  static readonly configSchema = notarizeSettings;

  constructor(
    readonly name: string,
    private readonly config: BuildConfig,
    private readonly context: TaskContext<NotarizeSettings>
  ) {}

  async postBuild(): Promise<void> {
    const { logger, runner, settings } = this.context;
    if (!this.config.build.mac) {
      logger.info('mac build is disabled, nothing to notarize');
      return;
    }

    const [archive] = fs
      .readdirSync(this.config.output)
      .filter((file) => file.endsWith('-mac.zip'))
      .sort();
    if (archive === undefined) {
      throw new Error(`No '*-mac.zip' archive found in '${this.config.output}'`);
    }
    const archivePath = path.join(this.config.output, archive);

    const command = this.config.notarizer.command;
    const workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'buildrig-notarize-'));
    const configFile = path.join(workDir, 'notarize.yml');
    try {
      fs.writeFileSync(configFile, yaml.dump(settings));
      logger.info({ archive: archivePath }, 'Notarizing mac build');

      const result = await runner.run(command, ['-c', configFile, archivePath, 'full-run']);
      if (result.exitCode !== 0) {
        throw new ExternalToolError(command, `'${command}' exited with code ${result.exitCode}`, {
          exitCode: result.exitCode,
          output: result.lines.slice(-20),
        });
      }
    } finally {
      fs.rmSync(workDir, { recursive: true, force: true });
    }
  }
}
