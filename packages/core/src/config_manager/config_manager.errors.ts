/**
 * Thrown when config.json cannot be read, parsed or validated.
 */
export class ConfigError extends Error {
  constructor(message: string, public readonly source: string, public readonly field?: string) {
    super(`Invalid configuration ${source}: ${message}`);
    this.name = 'ConfigError';
  }
}
