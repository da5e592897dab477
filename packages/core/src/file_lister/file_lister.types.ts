/**
 * Options for file listing.
 */
export interface FileListOptions {
  /** Glob patterns to ignore (e.g., ['node_modules/**']) */
  ignore?: string[];
  /** Only return files (not directories). Default: true */
  onlyFiles?: boolean;
  /** Return absolute paths instead of relative. Default: false */
  absolute?: boolean;
  /** Maximum depth to traverse. Default: unlimited */
  maxDepth?: number;
}

/**
 * File statistics returned by stat().
 */
export interface FileStats {
  /** File size in bytes */
  size: number;
  /** Last modification time as timestamp (ms since epoch) */
  mtime: number;
  /** Whether it's a file (not directory) */
  isFile: boolean;
}

/**
 * Options for FsFileLister.
 */
export interface FsFileListerOptions {
  /** Base directory for all operations */
  cwd: string;
}

/**
 * Options for MockFileLister.
 */
export interface MockFileListerOptions {
  /** Map of filePath -> content (text or raw bytes) */
  files?: Map<string, string | Buffer> | Record<string, string | Buffer>;
  /** Map of filePath -> stats (optional, generated if not provided) */
  stats?: Map<string, FileStats>;
  /** Paths that exist but fail with PERMISSION_DENIED on read */
  unreadable?: string[];
}
