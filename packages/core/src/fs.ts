/**
 * Filesystem-dependent implementations
 *
 * This module exports all implementations that require filesystem access.
 * Use ./memory for in-memory alternatives.
 */

// ConfigStore + ConfigManager Factories
export {
  FsConfigStore,
  CONFIG_DIR,
  // Factory with explicit projectRoot (for DI containers)
  createConfigManager,
} from './config_store/fs/fs_config_store';

// FileLister
export { FsFileLister } from './file_lister/fs/fs_file_lister';
export type { FsFileListerOptions } from './file_lister';

// Scan target
export { openFsTarget } from './pattern_scanner/scan_target';
