/**
 * SandboxFileStore Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, symlinkSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import * as path from 'path';
import { SandboxFileStore, backupFileName, parseBackupName } from './SandboxFileStore.js';

describe('SandboxFileStore', () => {
  let workspace: string;
  let sandboxDir: string;
  let outsideDir: string;
  let store: SandboxFileStore;

  beforeEach(() => {
    workspace = mkdtempSync(path.join(tmpdir(), 'codemender-store-'));
    sandboxDir = path.join(workspace, 'sandbox');
    outsideDir = path.join(workspace, 'outside');
    mkdirSync(sandboxDir);
    mkdirSync(outsideDir);
    store = new SandboxFileStore(sandboxDir);
  });

  afterEach(() => {
    rmSync(workspace, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  describe('Path validation', () => {
    it('should resolve relative paths from the sandbox root', async () => {
      const result = await store.resolvePath('pkg/module.py');

      expect(result).toEqual({ success: true, value: path.join(store.root, 'pkg', 'module.py') });
    });

    it('should accept the root itself', async () => {
      const result = await store.resolvePath('.');

      expect(result).toEqual({ success: true, value: store.root });
    });

    it('should reject parent traversal', async () => {
      const result = await store.resolvePath('../outside/secret.py');

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.failure.kind).toBe('sandbox_violation');
        expect(result.failure.message).toBe(`Access denied: ../outside/secret.py is outside sandbox ${store.root}`);
      }
    });

    it('should reject absolute paths outside the sandbox', async () => {
      const result = await store.resolvePath(path.join(outsideDir, 'x.py'));

      expect(result.success).toBe(false);
      if (!result.success) expect(result.failure.kind).toBe('sandbox_violation');
    });

    it('should reject a sibling directory sharing the root as a name prefix', async () => {
      mkdirSync(path.join(workspace, 'sandbox-evil'));

      const result = await store.resolvePath(path.join(workspace, 'sandbox-evil', 'x.py'));

      expect(result.success).toBe(false);
    });

    it('should reject symlinks that lead outside', async () => {
      writeFileSync(path.join(outsideDir, 'secret.py'), 'TOKEN = 1\n');
      symlinkSync(outsideDir, path.join(sandboxDir, 'escape'));

      const read = await store.read('escape/secret.py');

      expect(read.success).toBe(false);
      if (!read.success) expect(read.failure.kind).toBe('sandbox_violation');
    });

    it('should not write through a dangling symlink that points outside', async () => {
      const outsideTarget = path.join(outsideDir, 'planted.py');
      symlinkSync(outsideTarget, path.join(sandboxDir, 'planted.py'));

      const result = await store.write('planted.py', 'print("hi")\n');

      expect(result.success).toBe(false);
      if (!result.success) expect(result.failure.kind).toBe('sandbox_violation');
      expect(existsSync(outsideTarget)).toBe(false);
    });
  });

  describe('Read and write', () => {
    it('should report missing files as not_found', async () => {
      const result = await store.read('missing.py');

      expect(result).toEqual({
        success: false,
        failure: { kind: 'not_found', message: 'File not found: missing.py' }
      });
    });

    it('should create parent directories and skip the backup for new files', async () => {
      const result = await store.write('pkg/new.py', 'x = 1\n');

      expect(result.success).toBe(true);
      if (result.success) expect(result.value.backupPath).toBeUndefined();
      expect(readFileSync(path.join(sandboxDir, 'pkg', 'new.py'), 'utf-8')).toBe('x = 1\n');
      expect(existsSync(store.backupDir)).toBe(false);
    });

    it('should back up the prior content before overwriting', async () => {
      await store.write('calc.py', 'version = 1\n');
      const result = await store.write('calc.py', 'version = 2\n');

      expect(result.success).toBe(true);
      if (!result.success) return;
      const backupPath = result.value.backupPath;
      expect(backupPath).toBeDefined();
      if (!backupPath) return;

      expect(path.dirname(backupPath)).toBe(store.backupDir);
      expect(path.basename(backupPath)).toMatch(/^calc_\d{8}_\d{6}(_\d+)?\.py$/);
      expect(readFileSync(backupPath, 'utf-8')).toBe('version = 1\n');
      expect(readFileSync(path.join(sandboxDir, 'calc.py'), 'utf-8')).toBe('version = 2\n');
    });

    it('should keep both backups when a file is overwritten twice in a row', async () => {
      await store.write('calc.py', 'v1\n');
      const second = await store.write('calc.py', 'v2\n');
      const third = await store.write('calc.py', 'v3\n');

      expect(second.success && third.success).toBe(true);
      if (!second.success || !third.success) return;
      expect(second.value.backupPath).not.toBe(third.value.backupPath);

      const backups = await store.listBackups();
      expect(backups.success).toBe(true);
      if (backups.success) {
        expect(backups.value).toHaveLength(2);
        const contents = backups.value.map(b => readFileSync(b.path, 'utf-8')).sort();
        expect(contents).toEqual(['v1\n', 'v2\n']);
      }
    });

    it('should not back up when backups are not requested', async () => {
      await store.write('calc.py', 'v1\n');
      const result = await store.write('calc.py', 'v2\n', false);

      expect(result.success).toBe(true);
      if (result.success) expect(result.value.backupPath).toBeUndefined();
      expect(existsSync(store.backupDir)).toBe(false);
    });

    it('should abort the write when the backup cannot be made', async () => {
      writeFileSync(path.join(sandboxDir, 'calc.py'), 'original\n');
      // A regular file where the backup directory should be
      writeFileSync(path.join(sandboxDir, '.backups'), '');

      const result = await store.write('calc.py', 'replacement\n');

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.failure.kind).toBe('io_error');
        expect(result.failure.message).toMatch(/^Backup failed, write aborted: /);
      }
      expect(readFileSync(path.join(sandboxDir, 'calc.py'), 'utf-8')).toBe('original\n');
    });

    it('should refuse writes into the backup directory', async () => {
      const result = await store.write('.backups/calc_20250101_000000.py', 'x\n');

      expect(result.success).toBe(false);
      if (!result.success) expect(result.failure.kind).toBe('sandbox_violation');
    });
  });

  describe('Restore', () => {
    it('should copy a backup over the target', async () => {
      await store.write('calc.py', 'good\n');
      const overwritten = await store.write('calc.py', 'broken\n');
      if (!overwritten.success || !overwritten.value.backupPath) {
        throw new Error('expected a backup');
      }

      const restored = await store.restore(overwritten.value.backupPath, 'calc.py');

      expect(restored).toEqual({ success: true, value: { path: path.join(store.root, 'calc.py') } });
      expect(readFileSync(path.join(sandboxDir, 'calc.py'), 'utf-8')).toBe('good\n');
    });

    it('should validate the backup path against the sandbox', async () => {
      writeFileSync(path.join(outsideDir, 'payload.py'), 'evil\n');

      const restored = await store.restore(path.join(outsideDir, 'payload.py'), 'calc.py');

      expect(restored.success).toBe(false);
      if (!restored.success) expect(restored.failure.kind).toBe('sandbox_violation');
    });

    it('should report a missing backup as not_found', async () => {
      const restored = await store.restore('.backups/none_20250101_000000.py', 'calc.py');

      expect(restored.success).toBe(false);
      if (!restored.success) expect(restored.failure.kind).toBe('not_found');
    });
  });

  describe('Enumeration', () => {
    it('should list source files sorted by relative path, skipping backups and other extensions', async () => {
      writeFileSync(path.join(sandboxDir, 'zeta.py'), 'z = 1\n');
      mkdirSync(path.join(sandboxDir, 'pkg'));
      writeFileSync(path.join(sandboxDir, 'pkg', 'alpha.py'), 'a = 1\n');
      writeFileSync(path.join(sandboxDir, 'notes.txt'), 'not code');
      mkdirSync(path.join(sandboxDir, '.backups'));
      writeFileSync(path.join(sandboxDir, '.backups', 'zeta_20250101_000000.py'), 'old\n');

      const result = await store.enumerate();

      expect(result).toEqual({
        success: true,
        value: [
          { path: path.join(store.root, 'pkg', 'alpha.py'), relativePath: 'pkg/alpha.py', size: 6 },
          { path: path.join(store.root, 'zeta.py'), relativePath: 'zeta.py', size: 6 }
        ]
      });
    });

    it('should honour the configured extensions', async () => {
      const jsStore = new SandboxFileStore(sandboxDir, { extensions: ['.js', '.ts'] });
      writeFileSync(path.join(sandboxDir, 'a.py'), '');
      writeFileSync(path.join(sandboxDir, 'b.js'), '');
      writeFileSync(path.join(sandboxDir, 'c.ts'), '');

      const result = await jsStore.enumerate();

      expect(result.success).toBe(true);
      if (result.success) expect(result.value.map(f => f.relativePath)).toEqual(['b.js', 'c.ts']);
    });

    it('should skip a dangling link and keep the real files', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      writeFileSync(path.join(sandboxDir, 'calc.py'), 'x = 1\n');
      symlinkSync(path.join(sandboxDir, 'gone.py'), path.join(sandboxDir, 'alias.py'));

      const result = await store.enumerate();

      expect(result).toEqual({
        success: true,
        value: [{ path: path.join(store.root, 'calc.py'), relativePath: 'calc.py', size: 6 }]
      });
      expect(warn).toHaveBeenCalledWith('[SandboxFileStore] Skipping alias.py: broken link (ENOENT)');
    });

    it('should skip a link that points at itself', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      writeFileSync(path.join(sandboxDir, 'calc.py'), '');
      symlinkSync(path.join(sandboxDir, 'loop.py'), path.join(sandboxDir, 'loop.py'));

      const result = await store.enumerate();

      expect(result.success).toBe(true);
      if (result.success) expect(result.value.map(f => f.relativePath)).toEqual(['calc.py']);
    });

    it('should return an empty backup list when no backup was made', async () => {
      expect(await store.listBackups()).toEqual({ success: true, value: [] });
    });

    it('should describe the sandbox', async () => {
      writeFileSync(path.join(sandboxDir, 'one.py'), '');

      expect(await store.info()).toEqual({
        root: store.root,
        backupDir: path.join(store.root, '.backups'),
        exists: true,
        sourceFileCount: 1
      });
    });
  });

  describe('Backup names', () => {
    const when = new Date(2025, 0, 28, 11, 20, 39);

    it('should format stem, local timestamp and extension', () => {
      expect(backupFileName('/sandbox/calc.py', when)).toBe('calc_20250128_112039.py');
    });

    it('should append the collision counter after the timestamp', () => {
      expect(backupFileName('/sandbox/calc.py', when, 2)).toBe('calc_20250128_112039_2.py');
    });

    it('should parse names whose stem contains underscores', () => {
      expect(parseBackupName('buggy_calc_20250128_112039.py')).toEqual({
        originalStem: 'buggy_calc',
        extension: '.py',
        createdAt: when
      });
    });

    it('should ignore names that are not backups', () => {
      expect(parseBackupName('readme.md')).toBeUndefined();
    });
  });
});
