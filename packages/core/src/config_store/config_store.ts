/**
 * ConfigStore Interface
 *
 * Abstraction for config.json persistence, so ConfigManager can read
 * project configuration from disk or from memory in tests.
 */

/**
 * Raw configuration as read from its source, before validation.
 */
export interface RawConfig {
  content: unknown;
  /** Where it was read from, for error messages */
  source: string;
}

/**
 * Interface for project configuration persistence.
 *
 * Implementations:
 * - FsConfigStore: Filesystem-based (.secposture/config.json)
 * - MemoryConfigStore: In-memory for tests
 *
 * @example
 * ```typescript
 * const store = new FsConfigStore('/path/to/project');
 * const raw = await store.loadConfig();
 * ```
 */
export interface ConfigStore {
  /**
   * @returns Parsed config.json, or null when the file does not exist
   * @throws ConfigError if the file exists but is not valid JSON
   */
  loadConfig(): Promise<RawConfig | null>;
}
