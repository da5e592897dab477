/**
 * ConfigManager Types
 */

import type { Scope } from '../assessment_store/assessment_store.types';

/**
 * Scan settings after defaults are applied.
 */
export interface ScanSettings {
  /** Glob patterns excluded from scans, relative to the scan root */
  exclude: string[];
  /** Bytes */
  maxFileSize: number;
  perFileTimeoutMs: number;
  /** Files evaluated per batch */
  concurrency: number;
  /** Locations listed in scanner evidence */
  maxEvidenceLocations: number;
}

/**
 * Contents of .secposture/config.json. Every field is optional.
 */
export interface ConfigFile {
  /** Control catalog file, relative to the project root */
  catalogPath?: string;
  scan?: Partial<ScanSettings>;
  /** Default scope for reports */
  scope?: Scope;
}

/**
 * Effective configuration after merging config.json with defaults.
 */
export interface SecpostureConfig {
  /** Absolute path, or null to use the bundled catalog */
  catalogPath: string | null;
  scan: ScanSettings;
  scope: Scope | null;
  /** Where the configuration came from ("defaults" when no file exists) */
  source: string;
}
