/**
 * MockFileLister - In-memory FileLister for testing
 *
 * Simulates a source tree using a Map. Used for scanner tests without I/O.
 *
 * @module file_lister/memory/mock_file_lister
 */

import picomatch from 'picomatch';
import type { FileLister, FileListOptions, FileStats, MockFileListerOptions } from '../file_lister';
import { FileListerError } from '../file_lister';

function toBuffer(content: string | Buffer): Buffer {
  return typeof content === 'string' ? Buffer.from(content, 'utf-8') : Buffer.from(content);
}

function matchPatterns(patterns: string[], filePaths: string[]): string[] {
  const isMatch = picomatch(patterns, { dot: true });
  return filePaths.filter(filePath => isMatch(filePath));
}

function filterIgnored(filePaths: string[], ignorePatterns: string[]): string[] {
  if (!ignorePatterns.length) return filePaths;
  const isIgnored = picomatch(ignorePatterns, { dot: true });
  return filePaths.filter(filePath => !isIgnored(filePath));
}

/**
 * In-memory FileLister for testing.
 *
 * @example
 * ```typescript
 * const lister = new MockFileLister({
 *   files: { 'src/config.ts': 'const x = 1;', 'logo.png': Buffer.from([0x89, 0x00]) },
 *   unreadable: ['secrets/locked.env'],
 * });
 * ```
 */
export class MockFileLister implements FileLister {
  private readonly files: Map<string, Buffer>;
  private readonly stats: Map<string, FileStats>;
  private readonly unreadable: Set<string>;

  constructor(options: MockFileListerOptions = {}) {
    const entries = options.files instanceof Map
      ? Array.from(options.files.entries())
      : Object.entries(options.files ?? {});
    this.files = new Map(
      entries.map(([filePath, content]) => [filePath, toBuffer(content)])
    );
    this.stats = options.stats ?? new Map();
    this.unreadable = new Set(options.unreadable ?? []);
  }

  async list(patterns: string[], options?: FileListOptions): Promise<string[]> {
    let matched = matchPatterns(patterns, Array.from(this.files.keys()));

    if (options?.ignore?.length) {
      matched = filterIgnored(matched, options.ignore);
    }

    return matched.sort();
  }

  async exists(filePath: string): Promise<boolean> {
    return this.files.has(filePath);
  }

  async read(filePath: string): Promise<string> {
    const buffer = await this.readBytes(filePath);
    return buffer.toString('utf-8');
  }

  async readBytes(filePath: string): Promise<Buffer> {
    const content = this.files.get(filePath);
    if (content === undefined) {
      throw new FileListerError(`File not found: ${filePath}`, 'FILE_NOT_FOUND', filePath);
    }
    if (this.unreadable.has(filePath)) {
      throw new FileListerError(`Permission denied: ${filePath}`, 'PERMISSION_DENIED', filePath);
    }
    return content;
  }

  /**
   * Generates stats from content unless explicit stats were provided.
   */
  async stat(filePath: string): Promise<FileStats> {
    const content = this.files.get(filePath);
    if (content === undefined) {
      throw new FileListerError(`File not found: ${filePath}`, 'FILE_NOT_FOUND', filePath);
    }

    const explicitStats = this.stats.get(filePath);
    if (explicitStats) {
      return explicitStats;
    }

    return {
      size: content.length,
      mtime: 0,
      isFile: true,
    };
  }

  // ============================================
  // Testing utilities
  // ============================================

  addFile(filePath: string, content: string | Buffer): void {
    this.files.set(filePath, toBuffer(content));
  }

  removeFile(filePath: string): boolean {
    this.stats.delete(filePath);
    return this.files.delete(filePath);
  }

  size(): number {
    return this.files.size;
  }
}
