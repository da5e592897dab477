/**
 * MemoryConfigStore - In-memory implementation of ConfigStore
 */

import type { ConfigStore, RawConfig } from '../config_store';

/**
 * In-memory ConfigStore implementation for tests.
 *
 * @example
 * ```typescript
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ scan: { maxFileSize: 2048 } });
 * const manager = new ConfigManager(configStore, '/project');
 * ```
 */
export class MemoryConfigStore implements ConfigStore {
  private config: unknown = null;
  private present = false;

  async loadConfig(): Promise<RawConfig | null> {
    return this.present ? { content: this.config, source: '<memory>' } : null;
  }

  // ==================== Test Helper Methods ====================

  /**
   * Set raw configuration directly. Pass null to simulate a missing file.
   */
  setConfig(config: unknown): void {
    this.config = config;
    this.present = config !== null;
  }
}
