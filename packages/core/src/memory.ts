/**
 * In-memory implementations (no filesystem required)
 *
 * Suitable for testing and for scanning content that never touched disk.
 */

// ConfigStore
export { MemoryConfigStore } from './config_store/memory/memory_config_store';

// FileLister
export { MockFileLister } from './file_lister/memory/mock_file_lister';
export type { MockFileListerOptions } from './file_lister';
