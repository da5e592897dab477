export { ConfigManager, CONFIG_FILE_SCHEMA, defaultScanSettings } from './config_manager';
export { ConfigError } from './config_manager.errors';
export type { ConfigFile, ScanSettings, SecpostureConfig } from './config_manager.types';
