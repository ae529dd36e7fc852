import { describe, it, expect, beforeAll, afterEach, vi } from 'vitest';
import * as os from 'node:os';
import * as path from 'node:path';
import chalk from 'chalk';
import { withGroup } from '../utils/ci.js';
import { expandPath, getEnv } from '../utils/env.js';
import { formatTaskTable } from '../utils/ui.js';
import { BUILTIN_TASKS } from '../tasks/index.js';

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});

// ── env ──────────────────────────────────────────────────────────────────────

describe('getEnv', () => {
  it('should treat empty values as unset', () => {
    vi.stubEnv('BUILDRIG_TEST_VALUE', '  ');
    expect(getEnv('BUILDRIG_TEST_VALUE')).toBeUndefined();

    vi.stubEnv('BUILDRIG_TEST_VALUE', 'set');
    expect(getEnv('BUILDRIG_TEST_VALUE')).toBe('set');
  });
});

describe('expandPath', () => {
  it('should expand the home directory', () => {
    expect(expandPath('~')).toBe(os.homedir());
    expect(expandPath('~/patches')).toBe(path.join(os.homedir(), 'patches'));
  });

  it('should resolve relative paths against the working directory', () => {
    expect(expandPath('patches')).toBe(path.resolve('patches'));
    expect(expandPath('/abs/patches')).toBe('/abs/patches');
  });
});

// ── ci ───────────────────────────────────────────────────────────────────────

describe('withGroup', () => {
  it('should wrap output in a group on GitHub Actions', async () => {
    vi.stubEnv('GITHUB_ACTIONS', 'true');
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    const value = await withGroup('Build Android', async () => 42);

    expect(value).toBe(42);
    expect(write.mock.calls.map((c) => c[0])).toEqual(['::group::Build Android\n', '::endgroup::\n']);
  });

  it('should close the group when the callback fails', async () => {
    vi.stubEnv('GITHUB_ACTIONS', 'true');
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    await expect(withGroup('Pre-Build Tasks', async () => {
      throw new Error('task failed');
    })).rejects.toThrow('task failed');

    expect(write.mock.calls.map((c) => c[0])).toEqual(['::group::Pre-Build Tasks\n', '::endgroup::\n']);
  });

  it('should print nothing elsewhere', async () => {
    vi.stubEnv('GITHUB_ACTIONS', '');
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    expect(await withGroup('Build pc', async () => 'done')).toBe('done');
    expect(write).not.toHaveBeenCalled();
  });
});

// ── ui ───────────────────────────────────────────────────────────────────────

describe('formatTaskTable', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it('should list built-in tasks by descending priority', () => {
    const lines = formatTaskTable(BUILTIN_TASKS);

    expect(lines).toEqual([
      `  ${'Task'.padEnd(25)}  Priority  ${'Stages'.padEnd(10)}  Affected files`,
      `  ${'patch'.padEnd(25)}      1000  pre-build`,
      `  ${'overwrite_keystore'.padEnd(25)}         0  ${'pre-build'.padEnd(10)}  rapt/android.keystore`,
      `  set_extended_memory_limit         0  post-build`,
      `  ${'notarize'.padEnd(25)}         0  post-build`,
      `  ${'clean'.padEnd(25)}     -1000  post-build`,
    ]);
  });
});
