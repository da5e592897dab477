/**
 * ConfigStore - Configuration persistence abstraction
 */
export type { ConfigStore, RawConfig } from './config_store';
export { FsConfigStore, CONFIG_DIR, createConfigManager } from './fs/fs_config_store';
export { MemoryConfigStore } from './memory/memory_config_store';
