import { Command, Option } from 'commander';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface CatalogCommandOptions extends BaseCommandOptions {
  catalog?: string;
  /** List the controls of this domain instead of the domain table */
  domain?: string;
  output?: 'text' | 'json';
}

/**
 * Catalog Command - lists domains with control counts, or the controls of one domain.
 */
export class CatalogCommand extends BaseCommand<CatalogCommandOptions> {
  protected description = 'List control domains, or the controls of one domain';

  register(program: Command): void {
    program
      .command('catalog')
      .description(this.description)
      .option('-c, --catalog <file>', 'Control catalog file (JSON or YAML)')
      .option('-d, --domain <name>', 'Show the controls of one domain')
      .addOption(new Option('-o, --output <format>', 'Output format').choices(['text', 'json']).default('text'))
      .option('--verbose', 'Show error details', false)
      .action(async (options: CatalogCommandOptions) => {
        await this.execute(options);
      });
  }

  async execute(options: CatalogCommandOptions): Promise<void> {
    const opts: CatalogCommandOptions = { ...options, json: options.output === 'json' };

    await this.run(opts, async () => {
      const catalog = await this.container.getCatalog(opts.catalog);

      if (opts.domain) {
        const domain = catalog.domain(opts.domain);
        if (!domain) {
          throw new Error(`Unknown domain: ${opts.domain}. Known domains: ${catalog.domains().join(', ')}`);
        }
        const controls = catalog.controlsInDomain(domain.name);
        if (opts.json) {
          this.handleSuccess({ domain: domain.name, controls }, opts);
          return;
        }
        console.log(`${domain.name} (${controls.length} controls)`);
        for (const control of controls) {
          console.log(`  ${control.id.padEnd(8)} ${control.riskClass.padEnd(9)} ${control.name}`);
        }
        return;
      }

      const stats = catalog.statistics();
      if (opts.json) {
        this.handleSuccess(stats, opts);
        return;
      }
      console.log(`${stats.totalControls} controls in ${stats.totalDomains} domains`);
      for (const name of catalog.domains()) {
        console.log(`  ${name.padEnd(36)} ${String(stats.controlsPerDomain[name] ?? 0).padStart(3)}`);
      }
    });
  }
}
