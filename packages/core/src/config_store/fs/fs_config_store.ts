/**
 * FsConfigStore - Filesystem implementation of ConfigStore
 *
 * Reads .secposture/config.json and provides project root detection.
 */

import { promises as fs } from 'fs';
import { existsSync } from 'fs';
import * as path from 'path';
import type { ConfigStore, RawConfig } from '../config_store';
import { ConfigManager } from '../../config_manager/config_manager';
import { ConfigError } from '../../config_manager/config_manager.errors';

export const CONFIG_DIR = '.secposture';

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Filesystem-based ConfigStore implementation.
 *
 * A missing file is not an error (defaults apply); a file that exists but
 * cannot be parsed is.
 *
 * @example
 * ```typescript
 * const store = new FsConfigStore('/path/to/project');
 * const manager = new ConfigManager(store, '/path/to/project');
 * const config = await manager.loadConfig();
 * ```
 */
export class FsConfigStore implements ConfigStore {
  readonly configPath: string;

  constructor(readonly projectRootPath: string) {
    this.configPath = path.join(projectRootPath, CONFIG_DIR, 'config.json');
  }

  async loadConfig(): Promise<RawConfig | null> {
    let configContent: string;
    try {
      configContent = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return null;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`could not be read: ${reason}`, this.configPath);
    }

    try {
      return { content: JSON.parse(configContent), source: this.configPath };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`is not valid JSON: ${reason}`, this.configPath);
    }
  }

  // ==================== Static Utility Methods ====================

  /**
   * Finds the project root by searching upwards, first for a .secposture
   * directory, then for a .git directory.
   *
   * @param startPath - Starting path (default: process.cwd())
   * @returns Absolute path to project root, or null if not found
   */
  static findProjectRoot(startPath: string = process.cwd()): string | null {
    for (const marker of [CONFIG_DIR, '.git']) {
      let currentPath = path.resolve(startPath);
      while (true) {
        if (existsSync(path.join(currentPath, marker))) {
          return currentPath;
        }
        const parent = path.dirname(currentPath);
        if (parent === currentPath) break;
        currentPath = parent;
      }
    }
    return null;
  }
}

/**
 * Create a ConfigManager for a project.
 * Auto-detects the project root if not provided.
 */
export function createConfigManager(projectRoot?: string): ConfigManager {
  const resolvedRoot = projectRoot || FsConfigStore.findProjectRoot() || process.cwd();
  return new ConfigManager(new FsConfigStore(resolvedRoot), resolvedRoot);
}
