/**
 * SandboxFileStore
 *
 * All file access of a run goes through here. Paths are canonicalized
 * (symlinks and `..` followed) and must land on or beneath the sandbox
 * root. Every overwrite is preceded by a timestamped copy of the prior
 * content in the reserved `.backups` directory.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { constants, realpathSync } from 'fs';
import { glob } from 'glob';

import { SandboxViolationError, errorMessage } from '../core/errors.js';
import {
  fail,
  failed,
  ok,
  type BackupRecord,
  type FileRecord,
  type Outcome,
  type SandboxInfo,
  type WriteReceipt
} from '../core/types.js';

export const BACKUP_DIR_NAME = '.backups';

const MAX_RESOLUTION_STEPS = 256;
const MAX_BACKUP_SUFFIX = 100;
const BACKUP_NAME_PATTERN = /^(.+)_(\d{4})(\d{2})(\d{2})_(\d{2})(\d{2})(\d{2})(?:_\d+)?$/;

export interface SandboxFileStoreOptions {
  /** Extensions enumerate() returns, with the dot (default: ['.py']) */
  extensions?: string[];
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * YYYYMMDD_HHMMSS in local time
 */
export function formatBackupTimestamp(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

/**
 * `{stem}_{YYYYMMDD_HHMMSS}{ext}`, with `_{n}` after the timestamp for the
 * n-th collision within the same second
 */
export function backupFileName(filePath: string, date: Date, collision: number = 0): string {
  const extension = path.extname(filePath);
  const stem = path.basename(filePath, extension);
  const suffix = collision > 0 ? `_${collision}` : '';
  return `${stem}_${formatBackupTimestamp(date)}${suffix}${extension}`;
}

export function parseBackupName(name: string): Pick<BackupRecord, 'originalStem' | 'extension' | 'createdAt'> | undefined {
  const extension = path.extname(name);
  const match = path.basename(name, extension).match(BACKUP_NAME_PATTERN);
  if (!match) return undefined;

  const [, stem, year, month, day, hours, minutes, seconds] = match;
  return {
    originalStem: stem,
    extension,
    createdAt: new Date(
      Number(year), Number(month) - 1, Number(day),
      Number(hours), Number(minutes), Number(seconds)
    )
  };
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function isMissing(error: unknown): boolean {
  const code = errorCode(error);
  return code === 'ENOENT' || code === 'ENOTDIR';
}

async function readLinkIfAny(target: string): Promise<string | undefined> {
  try {
    return await fs.readlink(target);
  } catch (error) {
    const code = errorCode(error);
    if (code === 'EINVAL' || code === 'ENOENT' || code === 'ENOTDIR') {
      return undefined;
    }
    throw error;
  }
}

function toPosix(relativePath: string): string {
  return relativePath.split(path.sep).join('/');
}

export class SandboxFileStore {
  readonly root: string;
  readonly backupDir: string;
  private extensions: string[];

  /**
   * @param root - existing directory; throws when it cannot be resolved
   */
  constructor(root: string, options: SandboxFileStoreOptions = {}) {
    this.root = realpathSync(path.resolve(root));
    this.backupDir = path.join(this.root, BACKUP_DIR_NAME);
    this.extensions = options.extensions ?? ['.py'];
  }

  // ===========================================================================
  // Path validation
  // ===========================================================================

  /**
   * Canonical absolute form of a path, or a sandbox_violation when that form
   * is not the root or beneath it. Relative paths are taken from the root.
   */
  async resolvePath(requested: string): Promise<Outcome<string>> {
    try {
      const canonical = await this.canonicalize(path.resolve(this.root, requested));
      this.assertContained(requested, canonical);
      return ok(canonical);
    } catch (error) {
      if (error instanceof SandboxViolationError) {
        return fail('sandbox_violation', error.message);
      }
      return fail('io_error', `Path validation failed for ${requested}: ${errorMessage(error)}`);
    }
  }

  /**
   * @throws SandboxViolationError when the canonical path leaves the root
   */
  private assertContained(requested: string, canonicalPath: string): void {
    if (!this.contains(canonicalPath)) {
      throw new SandboxViolationError(requested, this.root);
    }
  }

  /**
   * Whether a canonical path is the root or a descendant of it
   */
  contains(canonicalPath: string): boolean {
    const relative = path.relative(this.root, canonicalPath);
    if (relative === '') return true;
    return !path.isAbsolute(relative) &&
      relative !== '..' &&
      !relative.startsWith(`..${path.sep}`);
  }

  private isReserved(canonicalPath: string): boolean {
    const relative = path.relative(this.backupDir, canonicalPath);
    return relative === '' || (!path.isAbsolute(relative) && relative !== '..' && !relative.startsWith(`..${path.sep}`));
  }

  /**
   * realpath for paths that may not exist yet: the deepest existing
   * ancestor is resolved and the missing tail appended. Dangling symlinks
   * are followed to their target so a write cannot escape through one.
   */
  private async canonicalize(absolute: string): Promise<string> {
    const missingTail: string[] = [];
    let current = absolute;

    for (let step = 0; step < MAX_RESOLUTION_STEPS; step++) {
      try {
        const real = await fs.realpath(current);
        return path.join(real, ...missingTail);
      } catch (error) {
        if (!isMissing(error)) throw error;
      }

      const link = await readLinkIfAny(current);
      if (link !== undefined) {
        current = path.resolve(path.dirname(current), link);
        continue;
      }

      const parent = path.dirname(current);
      if (parent === current) break;
      missingTail.unshift(path.basename(current));
      current = parent;
    }

    throw new Error(`Too many levels of indirection resolving ${absolute}`);
  }

  /**
   * Resolve a path and require that something exists there (a regular
   * file unless `allowDirectory`)
   */
  async locate(requested: string, allowDirectory: boolean = false): Promise<Outcome<string>> {
    const resolved = await this.resolvePath(requested);
    if (!resolved.success) return resolved;

    try {
      const stat = await fs.stat(resolved.value);
      if (!stat.isFile() && !(allowDirectory && stat.isDirectory())) {
        return fail('not_found', `Not a file: ${requested}`);
      }
    } catch (error) {
      if (isMissing(error)) return fail('not_found', `File not found: ${requested}`);
      return fail('io_error', errorMessage(error));
    }
    return resolved;
  }

  // ===========================================================================
  // Read / write
  // ===========================================================================

  async read(filePath: string): Promise<Outcome<string>> {
    const resolved = await this.resolvePath(filePath);
    if (!resolved.success) return resolved;

    try {
      return ok(await fs.readFile(resolved.value, 'utf-8'));
    } catch (error) {
      if (isMissing(error)) {
        return fail('not_found', `File not found: ${filePath}`);
      }
      return fail('io_error', `Read error: ${errorMessage(error)}`);
    }
  }

  /**
   * Write a file, copying the existing content to the backup directory
   * first. A failed backup aborts the write.
   */
  async write(filePath: string, content: string, makeBackup: boolean = true): Promise<Outcome<WriteReceipt>> {
    const resolved = await this.resolvePath(filePath);
    if (!resolved.success) return failed(resolved.failure);
    const target = resolved.value;

    if (this.isReserved(target)) {
      return fail('sandbox_violation', `Access denied: ${filePath} is inside the reserved ${BACKUP_DIR_NAME} directory`);
    }

    let backupPath: string | undefined;
    if (makeBackup) {
      try {
        if (await this.isExistingFile(target)) {
          backupPath = await this.createBackup(target);
        }
      } catch (error) {
        return fail('io_error', `Backup failed, write aborted: ${errorMessage(error)}`);
      }
    }

    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, content, 'utf-8');
    } catch (error) {
      return fail('io_error', `Write error: ${errorMessage(error)}`);
    }

    return ok({ path: target, backupPath });
  }

  /**
   * Copy a backup over a target. Both paths go through sandbox validation.
   */
  async restore(backupPath: string, targetPath: string): Promise<Outcome<{ path: string }>> {
    const backup = await this.resolvePath(backupPath);
    if (!backup.success) return failed(backup.failure);
    const target = await this.resolvePath(targetPath);
    if (!target.success) return failed(target.failure);

    if (this.isReserved(target.value)) {
      return fail('sandbox_violation', `Access denied: cannot restore into the reserved ${BACKUP_DIR_NAME} directory`);
    }
    try {
      if (!await this.isExistingFile(backup.value)) {
        return fail('not_found', `Backup not found: ${backupPath}`);
      }
      await fs.mkdir(path.dirname(target.value), { recursive: true });
      await fs.copyFile(backup.value, target.value);
    } catch (error) {
      return fail('io_error', `Restore error: ${errorMessage(error)}`);
    }
    return ok({ path: target.value });
  }

  private async isExistingFile(target: string): Promise<boolean> {
    try {
      return (await fs.stat(target)).isFile();
    } catch (error) {
      if (isMissing(error)) return false;
      throw error;
    }
  }

  private async createBackup(target: string): Promise<string> {
    await fs.mkdir(this.backupDir, { recursive: true });
    const now = new Date();

    for (let collision = 0; collision < MAX_BACKUP_SUFFIX; collision++) {
      const destination = path.join(this.backupDir, backupFileName(target, now, collision));
      try {
        await fs.copyFile(target, destination, constants.COPYFILE_EXCL);
        return destination;
      } catch (error) {
        if (errorCode(error) !== 'EEXIST') throw error;
      }
    }

    throw new Error(`No free backup name for ${path.basename(target)} at ${formatBackupTimestamp(now)}`);
  }

  // ===========================================================================
  // Enumeration
  // ===========================================================================

  /**
   * Source files with a configured extension, sorted by relative path.
   * Nothing under a backup directory is returned.
   */
  async enumerate(subdirectory?: string): Promise<Outcome<FileRecord[]>> {
    const base = await this.resolvePath(subdirectory ?? '.');
    if (!base.success) return failed(base.failure);

    try {
      const stat = await fs.stat(base.value);
      if (!stat.isDirectory()) {
        return fail('io_error', `Not a directory: ${subdirectory}`);
      }
    } catch (error) {
      if (isMissing(error)) return fail('not_found', `Directory not found: ${subdirectory}`);
      return fail('io_error', errorMessage(error));
    }

    try {
      const matches = await glob(this.extensions.map(ext => `**/*${ext}`), {
        cwd: base.value,
        nodir: true,
        ignore: [`**/${BACKUP_DIR_NAME}/**`, '**/node_modules/**', '**/__pycache__/**']
      });

      const records = new Map<string, FileRecord>();
      for (const match of matches) {
        const record = await this.recordFor(base.value, match);
        if (record) records.set(record.path, record);
      }

      return ok([...records.values()].sort((a, b) => a.relativePath.localeCompare(b.relativePath)));
    } catch (error) {
      return fail('io_error', `Enumeration failed: ${errorMessage(error)}`);
    }
  }

  /**
   * FileRecord for one glob match, or undefined when the entry is skipped:
   * it resolves outside the sandbox or into `.backups`, or it is a dangling
   * or looping symlink
   */
  private async recordFor(base: string, match: string): Promise<FileRecord | undefined> {
    let canonical: string;
    let size: number;
    try {
      canonical = await this.canonicalize(path.join(base, match));
      if (!this.contains(canonical) || this.isReserved(canonical)) {
        console.warn(`[SandboxFileStore] Skipping ${match}: resolves outside the sandbox`);
        return undefined;
      }
      size = (await fs.stat(canonical)).size;
    } catch (error) {
      if (isMissing(error) || errorCode(error) === 'ELOOP') {
        console.warn(`[SandboxFileStore] Skipping ${match}: broken link (${errorCode(error)})`);
        return undefined;
      }
      throw error;
    }

    return {
      path: canonical,
      relativePath: toPosix(path.relative(this.root, canonical)),
      size
    };
  }

  /**
   * Backups in the reserved directory, newest first
   */
  async listBackups(): Promise<Outcome<BackupRecord[]>> {
    let names: string[];
    try {
      names = await fs.readdir(this.backupDir);
    } catch (error) {
      if (isMissing(error)) return ok([]);
      return fail('io_error', errorMessage(error));
    }

    const backups: BackupRecord[] = [];
    for (const name of names) {
      const parsed = parseBackupName(name);
      if (!parsed) continue;
      const backupPath = path.join(this.backupDir, name);
      const stat = await fs.stat(backupPath);
      if (!stat.isFile()) continue;
      backups.push({ path: backupPath, name, size: stat.size, ...parsed });
    }

    backups.sort((a, b) =>
      b.createdAt.getTime() - a.createdAt.getTime() || b.name.localeCompare(a.name)
    );
    return ok(backups);
  }

  async info(): Promise<SandboxInfo> {
    const files = await this.enumerate();
    let exists = true;
    try {
      await fs.access(this.root);
    } catch {
      exists = false;
    }
    return {
      root: this.root,
      backupDir: this.backupDir,
      exists,
      sourceFileCount: files.success ? files.value.length : 0
    };
  }
}
