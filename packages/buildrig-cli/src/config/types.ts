import { z } from 'zod';
import type { PipelineConfig } from '@buildrig/core';

export type Platform = 'pc' | 'mac' | 'android';

export interface SdkSettings {
  /** Concrete version once resolved; 'latest' until then */
  version: string;
  registry: string | null;
  /** Executable of the SDK version manager */
  command: string;
  /** Installation directory of the resolved version, set by the driver */
  path?: string;
}

export interface NotarizerSettings {
  command: string;
}

export interface BuildConfig extends PipelineConfig {
  /** Project directory (from the command line) */
  project: string;
  /** Output directory for build artifacts (from the command line) */
  output: string;
  debug: boolean;
  build: Record<Platform, boolean>;
  sdk: SdkSettings;
  notarizer: NotarizerSettings;
}

/**
 * Schema of the YAML config file. Unknown top-level keys pass through:
 * they are task subtrees, validated by each task's own schema.
 */
export const configFileSchema = z
  .object({
    build: z
      .object({
        pc: z.boolean().default(true),
        mac: z.boolean().default(true),
        android: z.boolean().default(true),
      })
      .default({}),
    sdk: z
      .object({
        version: z.string().min(1).default('latest'),
        registry: z.string().min(1).nullable().default(null),
        command: z.string().min(1).default('renutil'),
      })
      .default({}),
    notarizer: z
      .object({
        command: z.string().min(1).default('renotize'),
      })
      .default({}),
    tasks: z.record(z.string(), z.unknown()).default({}),
  })
  .passthrough();

export type ConfigFile = z.output<typeof configFileSchema>;
