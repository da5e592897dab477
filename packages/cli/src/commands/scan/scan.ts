import { Command } from 'commander';
import { ScanCommand } from './scan-command';

/**
 * Register the scan command
 */
export function registerScanCommand(program: Command): void {
  const scanCommand = new ScanCommand();
  scanCommand.register(program);
}
