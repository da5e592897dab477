import * as path from 'path';
import { Command, Option } from 'commander';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';
import type { Assessments, AuditReport, Logger, Scanner } from '@secposture/core';
import { renderQuietText, renderReportText, writeReportFile } from '../../output/report-formatter';
import { parsePositiveInt, splitCsv } from '../../utils/option-parsers';

/**
 * Options shared by commands that build a report.
 */
export interface ReportOutputOptions extends BaseCommandOptions {
  /** Control catalog file (default: configured or bundled catalog) */
  catalog?: string;
  /** Assessment file (JSON or YAML) */
  assessments?: string;
  /** System name shown in the report */
  name?: string;
  /** Output format (default: 'text') */
  output?: 'text' | 'json';
  /** Also write the JSON report to this file */
  out?: string;
}

/**
 * CLI options for the scan command
 */
export interface ScanCommandOptions extends ReportOutputOptions {
  /** Directory to scan */
  path: string;
  /** Additional globs to exclude (CSV) */
  exclude?: string;
  /** Bytes */
  maxFileSize?: number;
  /** Per-file evaluation budget in ms */
  timeout?: number;
}

/**
 * Scope with the given name, keeping any other scope fields.
 */
export function withName(scope: Assessments.Scope | null, name: string): Assessments.Scope {
  return scope
    ? { ...scope, name }
    : { name, criticality: 'medium', dataClasses: [], frameworksRequired: [] };
}

export function logLevelFor(options: BaseCommandOptions): Logger.LogLevel {
  if (options.verbose) return 'debug';
  if (options.json || options.quiet) return 'silent';
  return 'warn';
}

/**
 * Scan Command - Thin wrapper around PatternScanner and AuditSession
 *
 * Responsibilities (CLI only):
 * - Parse CLI arguments and merge them with config.json
 * - Format output (text/json)
 * - Exit 1 only when the scan could not run
 */
export class ScanCommand extends BaseCommand<ScanCommandOptions> {
  protected description = 'Scan a source tree and report its security posture';

  register(program: Command): void {
    program
      .command('scan <path>')
      .description(this.description)
      .option('-c, --catalog <file>', 'Control catalog file (JSON or YAML)')
      .option('-a, --assessments <file>', 'Assessment file applied before the scan')
      .option('-n, --name <name>', 'System name shown in the report')
      .option('-e, --exclude <globs>', 'Additional globs to exclude (CSV)')
      .option('--max-file-size <bytes>', 'Skip files larger than this', parsePositiveInt)
      .option('--timeout <ms>', 'Per-file evaluation budget', parsePositiveInt)
      .addOption(new Option('-o, --output <format>', 'Output format').choices(['text', 'json']).default('text'))
      .option('--out <file>', 'Also write the JSON report to a file')
      .option('-q, --quiet', 'Only print critical findings', false)
      .option('--verbose', 'Show scanner progress and error details', false)
      .action(async (targetPath: string, options: Omit<ScanCommandOptions, 'path'>) => {
        await this.execute({ ...options, path: targetPath });
      });
  }

  async execute(options: ScanCommandOptions): Promise<void> {
    const opts: ScanCommandOptions = { ...options, json: options.output === 'json' };

    await this.run(opts, async () => {
      const config = await this.container.getConfig();
      const catalog = await this.container.getCatalog(opts.catalog);
      const session = this.container.createAuditSession(catalog, {
        ...(config.scope ? { scope: config.scope } : {}),
        maxEvidenceLocations: config.scan.maxEvidenceLocations,
      });

      if (opts.assessments) {
        session.applyAssessmentFile(await this.container.loadAssessmentFile(opts.assessments));
      }
      if (opts.name) {
        session.setScope(withName(session.scope, opts.name));
      }

      const rootPath = path.resolve(opts.path);
      const scanner = this.container.getPatternScanner(catalog, logLevelFor(opts));
      if (!opts.json && !opts.quiet) {
        this.logger.log(`Scanning ${rootPath}...`);
      }

      const result = await scanner.scan({
        rootPath,
        exclusions: [...config.scan.exclude, ...splitCsv(opts.exclude)],
        maxFileSize: opts.maxFileSize ?? config.scan.maxFileSize,
        perFileTimeoutMs: opts.timeout ?? config.scan.perFileTimeoutMs,
        concurrency: config.scan.concurrency,
      });
      session.applyScan(result.matches);
      const report = session.buildReport(result.warnings);

      await this.emit(report, opts, result, rootPath);
    });
  }

  private async emit(
    report: AuditReport,
    options: ScanCommandOptions,
    result: Scanner.ScanResult,
    target: string
  ): Promise<void> {
    const written = options.out ? await writeReportFile(options.out, report) : null;

    if (options.json) {
      console.log(JSON.stringify(report, null, 2));
      return;
    }
    const lines = options.quiet
      ? renderQuietText(report)
      : renderReportText(report, {
        target,
        scannedFiles: result.scannedFiles,
        skippedFiles: result.skippedFiles,
        matches: result.matches.length,
        duration: result.duration,
      });
    for (const line of lines) {
      console.log(line);
    }
    if (written && !options.quiet) {
      console.log(`✅ Report written to ${written}`);
    }
  }
}
