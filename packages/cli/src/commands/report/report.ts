import { Command } from 'commander';
import { ReportCommand } from './report-command';

/**
 * Register the report command
 */
export function registerReportCommand(program: Command): void {
  const reportCommand = new ReportCommand();
  reportCommand.register(program);
}
