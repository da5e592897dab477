/**
 * ConfigManager - Project Configuration Manager
 *
 * Provides typed access to the project configuration (config.json),
 * merged with defaults and validated with ajv.
 *
 * Uses ConfigStore abstraction for backend-agnostic persistence.
 */

import * as path from 'path';
import type { ConfigStore } from '../config_store/config_store';
import { SCOPE_SCHEMA } from '../assessment_store/assessment_file';
import {
  DEFAULT_CONCURRENCY,
  DEFAULT_EXCLUSIONS,
  DEFAULT_MAX_FILE_SIZE,
  DEFAULT_PER_FILE_TIMEOUT_MS,
} from '../pattern_scanner/pattern_scanner';
import { DEFAULT_MAX_EVIDENCE_LOCATIONS } from '../pattern_scanner/match_aggregator';
import { SchemaValidationCache, formatValidationErrors } from '../schemas/schema_cache';
import { ConfigError } from './config_manager.errors';
import type { ConfigFile, ScanSettings, SecpostureConfig } from './config_manager.types';

export const CONFIG_FILE_SCHEMA = {
  type: 'object',
  additionalProperties: false,
  properties: {
    catalogPath: { type: 'string', minLength: 1 },
    scan: {
      type: 'object',
      additionalProperties: false,
      properties: {
        exclude: { type: 'array', items: { type: 'string', minLength: 1 } },
        maxFileSize: { type: 'integer', minimum: 1 },
        perFileTimeoutMs: { type: 'integer', minimum: 1 },
        concurrency: { type: 'integer', minimum: 1 },
        maxEvidenceLocations: { type: 'integer', minimum: 1 },
      },
    },
    scope: SCOPE_SCHEMA,
  },
} as const;

export function defaultScanSettings(): ScanSettings {
  return {
    exclude: [...DEFAULT_EXCLUSIONS],
    maxFileSize: DEFAULT_MAX_FILE_SIZE,
    perFileTimeoutMs: DEFAULT_PER_FILE_TIMEOUT_MS,
    concurrency: DEFAULT_CONCURRENCY,
    maxEvidenceLocations: DEFAULT_MAX_EVIDENCE_LOCATIONS,
  };
}

/**
 * Configuration Manager Class
 *
 * @example
 * ```typescript
 * // Production usage
 * const configManager = createConfigManager('/path/to/project');
 *
 * // Test usage
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ scan: { concurrency: 2 } });
 * const configManager = new ConfigManager(configStore, '/project');
 * ```
 */
export class ConfigManager {
  constructor(
    private readonly configStore: ConfigStore,
    private readonly projectRoot: string
  ) {}

  /**
   * Loads config.json and applies defaults. A missing file yields defaults.
   * @throws ConfigError if the file is unparsable or has the wrong shape
   */
  async loadConfig(): Promise<SecpostureConfig> {
    const raw = await this.configStore.loadConfig();
    if (!raw) {
      return { catalogPath: null, scan: defaultScanSettings(), scope: null, source: 'defaults' };
    }

    const validate = SchemaValidationCache.getValidator<ConfigFile>('config_file', CONFIG_FILE_SCHEMA);
    const content = raw.content;
    if (!validate(content)) {
      const [issue] = formatValidationErrors(validate.errors);
      throw new ConfigError(
        `field ${issue?.field ?? 'root'} ${issue?.message ?? 'is invalid'}`,
        raw.source,
        issue?.field
      );
    }

    return {
      catalogPath: content.catalogPath ? path.resolve(this.projectRoot, content.catalogPath) : null,
      scan: { ...defaultScanSettings(), ...content.scan },
      scope: content.scope ?? null,
      source: raw.source,
    };
  }

  getProjectRoot(): string {
    return this.projectRoot;
  }
}
