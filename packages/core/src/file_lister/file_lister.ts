/**
 * FileLister Interface
 *
 * Abstracts file listing and reading so the pattern scanner can walk a
 * source tree on disk or an in-memory tree in tests.
 *
 * @module file_lister
 */

import type { FileListOptions, FileStats } from './file_lister.types';

export { FileListerError } from './file_lister.errors';
export type { FileListerErrorCode } from './file_lister.errors';
export type {
  FileListOptions,
  FileStats,
  FsFileListerOptions,
  MockFileListerOptions,
} from './file_lister.types';

/**
 * Interface for listing and reading files.
 *
 * @example
 * ```typescript
 * // Filesystem backend (CLI)
 * const lister = new FsFileLister({ cwd: '/path/to/project' });
 *
 * // Memory backend (testing)
 * const lister = new MockFileLister({ files: { 'src/index.ts': 'code...' } });
 *
 * const files = await lister.list(['**\/*'], { ignore: ['**\/node_modules/**'] });
 * const bytes = await lister.readBytes('src/index.ts');
 * ```
 */
export interface FileLister {
  /**
   * Lists files matching glob patterns, including dotfiles.
   * @returns File paths relative to cwd
   */
  list(patterns: string[], options?: FileListOptions): Promise<string[]>;

  exists(filePath: string): Promise<boolean>;

  /**
   * Reads file content as a UTF-8 string.
   * @throws FileListerError if the file doesn't exist or can't be read
   */
  read(filePath: string): Promise<string>;

  /**
   * Reads raw file content, for callers that sniff binary data before decoding.
   * @throws FileListerError if the file doesn't exist or can't be read
   */
  readBytes(filePath: string): Promise<Buffer>;

  /**
   * @throws FileListerError if the file doesn't exist
   */
  stat(filePath: string): Promise<FileStats>;
}
