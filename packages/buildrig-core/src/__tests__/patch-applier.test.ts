import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import DiffMatchPatch from 'diff-match-patch';
import type { Logger } from 'pino';
import { BackupStore } from '../backup/backup-store.js';
import { applyPatchTree, walkDir } from '../patch/patch-applier.js';
import { PatchBatchError } from '../errors.js';

function createMockLogger(): Logger {
  const logger = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger as unknown as Logger;
}

const dmp = new DiffMatchPatch();

function makePatch(before: string, after: string): string {
  return dmp.patch_toText(dmp.patch_make(before, after));
}

const SCREENS = 'screen main_menu():\n    text "Start"\n    text "Quit"\n';
const CONFIG = 'define config.name = "Game"\ndefine config.version = "1.0"\n';
const OPTIONS = 'define build.name = "game"\ndefine build.directory_name = "game-1.0"\n';

describe('walkDir', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'buildrig-walk-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should list files recursively as sorted forward-slash paths', () => {
    fs.mkdirSync(path.join(tmpDir, 'renpy/common'), { recursive: true });
    fs.writeFileSync(path.join(tmpDir, 'renpy/common/00build.rpy'), '');
    fs.writeFileSync(path.join(tmpDir, 'launcher.rpy'), '');
    fs.mkdirSync(path.join(tmpDir, 'empty'));

    expect(walkDir(tmpDir)).toEqual(['launcher.rpy', 'renpy/common/00build.rpy']);
  });
});

describe('applyPatchTree', () => {
  let tmpDir: string;
  let patchDir: string;
  let targetRoot: string;
  let logger: Logger;
  let backups: BackupStore;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'buildrig-patch-'));
    patchDir = path.join(tmpDir, 'patches');
    targetRoot = path.join(tmpDir, 'sdk');
    logger = createMockLogger();
    backups = new BackupStore(logger);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeTarget(relativePath: string, content: string): string {
    const full = path.join(targetRoot, relativePath);
    fs.mkdirSync(path.dirname(full), { recursive: true });
    fs.writeFileSync(full, content);
    return full;
  }

  function writePatch(relativePath: string, content: string): void {
    const full = path.join(patchDir, relativePath);
    fs.mkdirSync(path.dirname(full), { recursive: true });
    fs.writeFileSync(full, content);
  }

  function catchBatchError(fn: () => unknown): PatchBatchError {
    try {
      fn();
    } catch (error) {
      if (error instanceof PatchBatchError) return error;
      throw error;
    }
    throw new Error('Expected a PatchBatchError');
  }

  // ── success ─────────────────────────────────────────────────────

  it('should apply every patch and keep pristine backups', () => {
    const screens = writeTarget('game/screens.rpy', SCREENS);
    const config = writeTarget('game/options.rpy', CONFIG);
    writePatch('game/screens.rpy', makePatch(SCREENS, SCREENS.replace('Quit', 'Exit')));
    writePatch('game/options.rpy', makePatch(CONFIG, CONFIG.replace('1.0', '1.1')));

    const result = applyPatchTree({ patchDir, targetRoot, backups, logger });

    expect(result.applied).toEqual(['game/options.rpy', 'game/screens.rpy']);
    expect(fs.readFileSync(screens, 'utf-8')).toBe(SCREENS.replace('Quit', 'Exit'));
    expect(fs.readFileSync(config, 'utf-8')).toBe(CONFIG.replace('1.0', '1.1'));
    expect(fs.readFileSync(`${screens}.original`, 'utf-8')).toBe(SCREENS);
  });

  it('should patch from the pristine copy on every run', () => {
    const screens = writeTarget('game/screens.rpy', SCREENS);
    writePatch('game/screens.rpy', makePatch(SCREENS, SCREENS.replace('Quit', 'Exit')));

    applyPatchTree({ patchDir, targetRoot, backups, logger });
    applyPatchTree({ patchDir, targetRoot, backups, logger });

    expect(fs.readFileSync(screens, 'utf-8')).toBe(SCREENS.replace('Quit', 'Exit'));
    expect(fs.readFileSync(`${screens}.original`, 'utf-8')).toBe(SCREENS);
  });

  // ── failure and rollback ────────────────────────────────────────

  it('should roll back every target when one patch cannot be parsed', () => {
    const a = writeTarget('a.rpy', SCREENS);
    const b = writeTarget('b.rpy', CONFIG);
    const c = writeTarget('c.rpy', OPTIONS);
    writePatch('a.rpy', makePatch(SCREENS, SCREENS.replace('Start', 'Begin')));
    writePatch('b.rpy', 'this is not a patch');
    writePatch('c.rpy', makePatch(OPTIONS, OPTIONS.replace('game-1.0', 'game-2.0')));

    const error = catchBatchError(() => applyPatchTree({ patchDir, targetRoot, backups, logger }));

    expect(error.failedPatches).toEqual(['b.rpy']);
    expect(error.message).toBe('Failed to apply 1 patch file, rolled back all changes: b.rpy');
    expect(fs.readFileSync(a, 'utf-8')).toBe(SCREENS);
    expect(fs.readFileSync(b, 'utf-8')).toBe(CONFIG);
    expect(fs.readFileSync(c, 'utf-8')).toBe(OPTIONS);
    for (const file of [a, b, c]) {
      expect(fs.existsSync(`${file}.original`)).toBe(false);
    }
  });

  it('should fail when a patch does not match its target', () => {
    const a = writeTarget('a.rpy', SCREENS);
    const b = writeTarget('b.rpy', 'something else entirely\n');
    writePatch('a.rpy', makePatch(SCREENS, SCREENS.replace('Start', 'Begin')));
    writePatch('b.rpy', makePatch(CONFIG, CONFIG.replace('1.0', '1.1')));

    const error = catchBatchError(() => applyPatchTree({ patchDir, targetRoot, backups, logger }));

    expect(error.failedPatches).toEqual(['b.rpy']);
    expect(fs.readFileSync(a, 'utf-8')).toBe(SCREENS);
    expect(fs.readFileSync(b, 'utf-8')).toBe('something else entirely\n');
  });

  it('should fail when a patch has no target', () => {
    const a = writeTarget('a.rpy', SCREENS);
    writePatch('a.rpy', makePatch(SCREENS, SCREENS.replace('Start', 'Begin')));
    writePatch('missing.rpy', makePatch(CONFIG, CONFIG.replace('1.0', '1.1')));

    const error = catchBatchError(() => applyPatchTree({ patchDir, targetRoot, backups, logger }));

    expect(error.failedPatches).toEqual(['missing.rpy']);
    expect(fs.readFileSync(a, 'utf-8')).toBe(SCREENS);
  });

  it('should roll back the batch when a target cannot be backed up', () => {
    const a = writeTarget('a.rpy', SCREENS);
    const b = path.join(targetRoot, 'b.rpy');
    fs.mkdirSync(b);
    writePatch('a.rpy', makePatch(SCREENS, SCREENS.replace('Start', 'Begin')));
    writePatch('b.rpy', makePatch(CONFIG, CONFIG.replace('1.0', '1.1')));

    const error = catchBatchError(() => applyPatchTree({ patchDir, targetRoot, backups, logger }));

    expect(error.failedPatches).toEqual(['b.rpy']);
    expect(fs.readFileSync(a, 'utf-8')).toBe(SCREENS);
    expect(fs.existsSync(`${a}.original`)).toBe(false);
    expect(fs.existsSync(`${b}.original`)).toBe(false);
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ patch: 'b.rpy' }),
      'Failed to back up patch target'
    );
  });

  it('should roll back the batch when a target cannot be restored from its backup', () => {
    const a = writeTarget('a.rpy', SCREENS);
    const b = writeTarget('b.rpy', CONFIG);
    writePatch('a.rpy', makePatch(SCREENS, SCREENS.replace('Start', 'Begin')));
    writePatch('b.rpy', makePatch(CONFIG, CONFIG.replace('1.0', '1.1')));
    applyPatchTree({ patchDir, targetRoot, backups, logger });

    const restore = backups.restoreFromBackup.bind(backups);
    vi.spyOn(backups, 'restoreFromBackup').mockImplementation((file) => {
      if (file === b) throw new Error('EACCES: permission denied');
      return restore(file);
    });

    const error = catchBatchError(() => applyPatchTree({ patchDir, targetRoot, backups, logger }));

    expect(error.failedPatches).toEqual(['b.rpy']);
    expect(fs.readFileSync(a, 'utf-8')).toBe(SCREENS);
    expect(fs.readFileSync(b, 'utf-8')).toBe(CONFIG);
    expect(fs.existsSync(`${b}.original`)).toBe(false);
  });

  it('should restore a previously patched target on rollback', () => {
    const a = writeTarget('a.rpy', SCREENS);
    writePatch('a.rpy', makePatch(SCREENS, SCREENS.replace('Start', 'Begin')));
    applyPatchTree({ patchDir, targetRoot, backups, logger });
    expect(fs.readFileSync(a, 'utf-8')).toBe(SCREENS.replace('Start', 'Begin'));

    writePatch('b.rpy', 'this is not a patch');
    writeTarget('b.rpy', CONFIG);

    expect(() => applyPatchTree({ patchDir, targetRoot, backups, logger })).toThrow(PatchBatchError);
    expect(fs.readFileSync(a, 'utf-8')).toBe(SCREENS);
  });
});
