import { Command, Option } from 'commander';
import { BaseCommand } from '../../base/base-command';
import type { ReportOutputOptions } from '../scan/scan-command';
import { withName } from '../scan/scan-command';
import { renderQuietText, renderReportText, writeReportFile } from '../../output/report-formatter';

export interface ReportCommandOptions extends ReportOutputOptions {
  assessments: string;
}

/**
 * Report Command - builds a report from an assessment file, without scanning.
 */
export class ReportCommand extends BaseCommand<ReportCommandOptions> {
  protected description = 'Build a posture report from an assessment file';

  register(program: Command): void {
    program
      .command('report')
      .description(this.description)
      .requiredOption('-a, --assessments <file>', 'Assessment file (JSON or YAML)')
      .option('-c, --catalog <file>', 'Control catalog file (JSON or YAML)')
      .option('-n, --name <name>', 'System name shown in the report')
      .addOption(new Option('-o, --output <format>', 'Output format').choices(['text', 'json']).default('text'))
      .option('--out <file>', 'Also write the JSON report to a file')
      .option('-q, --quiet', 'Only print critical findings', false)
      .option('--verbose', 'Show error details', false)
      .action(async (options: ReportCommandOptions) => {
        await this.execute(options);
      });
  }

  async execute(options: ReportCommandOptions): Promise<void> {
    const opts: ReportCommandOptions = { ...options, json: options.output === 'json' };

    await this.run(opts, async () => {
      const config = await this.container.getConfig();
      const catalog = await this.container.getCatalog(opts.catalog);
      const file = await this.container.loadAssessmentFile(opts.assessments);
      const session = this.container.createAuditSession(catalog, {
        ...(config.scope ? { scope: config.scope } : {}),
      });
      session.applyAssessmentFile(file);
      if (opts.name) {
        session.setScope(withName(session.scope, opts.name));
      }

      const report = session.buildReport();
      const written = opts.out ? await writeReportFile(opts.out, report) : null;

      if (opts.json) {
        console.log(JSON.stringify(report, null, 2));
        return;
      }
      for (const line of opts.quiet ? renderQuietText(report) : renderReportText(report)) {
        console.log(line);
      }
      if (written && !opts.quiet) {
        console.log(`✅ Report written to ${written}`);
      }
    });
  }
}
