#!/usr/bin/env node

import { Command } from 'commander';
import { registerScanCommand } from './commands/scan/scan';
import { registerReportCommand } from './commands/report/report';
import { registerCatalogCommand } from './commands/catalog/catalog';

const program = new Command();

program
  .name('secposture')
  .description('Security posture assessment, scoring and source pattern scanning')
  .version('0.1.0');

registerScanCommand(program);
registerReportCommand(program);
registerCatalogCommand(program);

program.parseAsync().catch((error: unknown) => {
  console.error("❌ Fatal error:", error instanceof Error ? error.message : error);
  process.exit(1);
});
