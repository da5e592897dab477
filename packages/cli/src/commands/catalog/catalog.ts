import { Command } from 'commander';
import { CatalogCommand } from './catalog-command';

/**
 * Register the catalog command
 */
export function registerCatalogCommand(program: Command): void {
  const catalogCommand = new CatalogCommand();
  catalogCommand.register(program);
}
