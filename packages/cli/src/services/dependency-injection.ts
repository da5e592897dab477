import * as path from 'path';
import { Assessments, Catalog, Config, Logger, Scanner, Session } from '@secposture/core';
import { FsConfigStore, createConfigManager } from '@secposture/core/fs';

/**
 * Dependency Injection Service for the secposture CLI
 *
 * Creates and caches the core objects commands need: configuration,
 * control catalogs, scanners and audit sessions.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private configManager: Config.ConfigManager | null = null;
  private config: Config.SecpostureConfig | null = null;
  private projectRoot: string | null = null;
  private readonly catalogs = new Map<string, Catalog.ControlCatalog>();

  private constructor() { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  /**
   * Resets the singleton instance (useful for testing)
   */
  static reset(): void {
    DependencyInjectionService.instance = null;
  }

  /**
   * Project root: SECPOSTURE_ROOT, else the nearest directory holding
   * .secposture or .git, else the working directory.
   */
  getProjectRoot(): string {
    if (!this.projectRoot) {
      this.projectRoot = process.env['SECPOSTURE_ROOT'] || FsConfigStore.findProjectRoot() || process.cwd();
    }
    return this.projectRoot;
  }

  getConfigManager(): Config.ConfigManager {
    if (!this.configManager) {
      this.configManager = createConfigManager(this.getProjectRoot());
    }
    return this.configManager;
  }

  /**
   * Effective configuration (defaults merged with .secposture/config.json).
   * @throws ConfigError if config.json is invalid
   */
  async getConfig(): Promise<Config.SecpostureConfig> {
    if (!this.config) {
      this.config = await this.getConfigManager().loadConfig();
    }
    return this.config;
  }

  /**
   * Loads a control catalog: the explicit path, then the configured
   * catalogPath, then the bundled catalog.
   * @throws CatalogLoadError
   */
  async getCatalog(catalogPath?: string): Promise<Catalog.ControlCatalog> {
    const config = await this.getConfig();
    const resolved = catalogPath
      ? path.resolve(catalogPath)
      : config.catalogPath ?? Catalog.resolveBundledCatalogPath();
    if (!resolved) {
      throw new Error('No control catalog found. Pass --catalog <file> or set catalogPath in .secposture/config.json.');
    }

    const cached = this.catalogs.get(resolved);
    if (cached) {
      return cached;
    }
    const catalog = await Catalog.loadControlCatalog(resolved);
    this.catalogs.set(resolved, catalog);
    return catalog;
  }

  /**
   * Creates a scanner whose progress logging uses the given level.
   * @throws DetectorConfigurationError if the catalog lacks a detector's control
   */
  getPatternScanner(catalog: Catalog.ControlCatalog, logLevel: Logger.LogLevel): Scanner.PatternScanner {
    return new Scanner.PatternScanner(catalog, {
      logger: Logger.createLogger('[scanner] ', logLevel),
    });
  }

  createAuditSession(catalog: Catalog.ControlCatalog, options: Session.AuditSessionOptions = {}): Session.AuditSession {
    return new Session.AuditSession(catalog, options);
  }

  /**
   * @throws AssessmentFileError
   */
  async loadAssessmentFile(filePath: string): Promise<Assessments.AssessmentFile> {
    return Assessments.loadAssessmentFile(path.resolve(filePath));
  }
}
