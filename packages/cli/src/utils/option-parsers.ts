import { InvalidArgumentError } from 'commander';

/**
 * Commander argument parser for positive integers.
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Splits a comma-separated option value, dropping empty entries.
 */
export function splitCsv(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(',').map(g => g.trim()).filter(g => g.length > 0);
}
