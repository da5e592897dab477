/**
 * FsFileLister - Filesystem-based FileLister implementation
 *
 * Uses fast-glob for pattern matching and fs/promises for file operations.
 * Used by the CLI to walk scan targets.
 *
 * @module file_lister/fs/fs_file_lister
 */

import fg from 'fast-glob';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { FileLister, FileListOptions, FileStats, FsFileListerOptions } from '../file_lister';
import { FileListerError } from '../file_lister';

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Filesystem-based FileLister implementation.
 *
 * @example
 * ```typescript
 * const lister = new FsFileLister({ cwd: '/path/to/project' });
 * const files = await lister.list(['**\/*'], { ignore: ['**\/node_modules/**'] });
 * const content = await lister.read('src/index.ts');
 * ```
 */
export class FsFileLister implements FileLister {
  private readonly cwd: string;

  constructor(options: FsFileListerOptions) {
    this.cwd = options.cwd;
  }

  /**
   * Lists files matching glob patterns. Patterns may not leave cwd.
   * Symbolic links are not followed.
   */
  async list(patterns: string[], options?: FileListOptions): Promise<string[]> {
    for (const pattern of patterns) {
      if (pattern.includes('..')) {
        throw new FileListerError(
          `Invalid pattern: path traversal not allowed: ${pattern}`,
          'INVALID_PATH',
          pattern
        );
      }
      if (path.isAbsolute(pattern)) {
        throw new FileListerError(
          `Invalid pattern: absolute paths not allowed: ${pattern}`,
          'INVALID_PATH',
          pattern
        );
      }
    }

    const fgOptions: Parameters<typeof fg>[1] = {
      cwd: this.cwd,
      ignore: options?.ignore ?? [],
      onlyFiles: options?.onlyFiles ?? true,
      absolute: options?.absolute ?? false,
      dot: true,
      followSymbolicLinks: false,
      suppressErrors: true,
    };

    if (options?.maxDepth !== undefined) {
      fgOptions.deep = options.maxDepth;
    }

    return fg(patterns, fgOptions);
  }

  async exists(filePath: string): Promise<boolean> {
    this.validatePath(filePath);

    try {
      await fs.access(path.join(this.cwd, filePath));
      return true;
    } catch {
      return false;
    }
  }

  async read(filePath: string): Promise<string> {
    const buffer = await this.readBytes(filePath);
    return buffer.toString('utf-8');
  }

  async readBytes(filePath: string): Promise<Buffer> {
    this.validatePath(filePath);

    const fullPath = path.join(this.cwd, filePath);
    try {
      return await fs.readFile(fullPath);
    } catch (err: unknown) {
      throw this.toListerError(err, filePath, 'Read error');
    }
  }

  async stat(filePath: string): Promise<FileStats> {
    this.validatePath(filePath);

    const fullPath = path.join(this.cwd, filePath);
    try {
      const stats = await fs.stat(fullPath);
      return {
        size: stats.size,
        mtime: stats.mtimeMs,
        isFile: stats.isFile(),
      };
    } catch (err: unknown) {
      throw this.toListerError(err, filePath, 'Stat error');
    }
  }

  private toListerError(err: unknown, filePath: string, prefix: string): FileListerError {
    const code = errorCode(err);
    if (code === 'ENOENT') {
      return new FileListerError(`File not found: ${filePath}`, 'FILE_NOT_FOUND', filePath);
    }
    if (code === 'EACCES' || code === 'EPERM') {
      return new FileListerError(`Permission denied: ${filePath}`, 'PERMISSION_DENIED', filePath);
    }
    return new FileListerError(`${prefix}: ${errorMessage(err)}`, 'READ_ERROR', filePath);
  }

  /**
   * Rejects paths that could escape cwd.
   */
  private validatePath(filePath: string): void {
    if (filePath.split(/[\\/]/).includes('..')) {
      throw new FileListerError(
        `Invalid path: path traversal not allowed: ${filePath}`,
        'INVALID_PATH',
        filePath
      );
    }
    if (path.isAbsolute(filePath)) {
      throw new FileListerError(
        `Invalid path: absolute paths not allowed: ${filePath}`,
        'INVALID_PATH',
        filePath
      );
    }
  }
}
