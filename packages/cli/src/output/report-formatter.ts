import { promises as fs } from 'fs';
import * as path from 'path';
import type { AuditReport, Scoring } from '@secposture/core';

const RULE = '─'.repeat(60);

/**
 * Scan statistics shown after a report produced by `scan`.
 */
export interface ScanInfo {
  target: string;
  scannedFiles: number;
  skippedFiles: number;
  matches: number;
  duration: number;
}

function section(title: string): string[] {
  return [RULE, title, RULE, ''];
}

export function formatScore(score: Scoring.Score): string {
  return score.kind === 'scored' ? score.value.toFixed(1) : 'n/a';
}

/**
 * Plain text rendering of a report: POSTURE, DOMAIN SCORES, FINDINGS,
 * then WARNINGS and SCAN INFO when present.
 */
export function renderReportText(report: AuditReport, scan?: ScanInfo): string[] {
  const { summary } = report;
  const counts = summary.statusCounts;
  const lines: string[] = [];

  lines.push(...section(report.scope ? `SECURITY POSTURE: ${report.scope.name}` : 'SECURITY POSTURE'));
  lines.push(`Overall score:  ${formatScore(summary.overall)} (${summary.posture})`);
  lines.push(
    `Assessed:       ${summary.totalAssessed} controls ` +
    `(compliant ${counts.compliant}, partial ${counts.partial}, non-compliant ${counts.non_compliant}, ` +
    `not applicable ${counts.not_applicable}, not assessed ${counts.not_assessed})`
  );
  if (summary.weakestDomains.length > 0) {
    const weakest = summary.weakestDomains.map(d => `${d.domain} (${d.score.toFixed(1)})`).join(', ');
    lines.push(`Weakest:        ${weakest}`);
  }
  lines.push('');

  lines.push(...section('DOMAIN SCORES'));
  for (const [domain, score] of Object.entries(report.scores.byDomain)) {
    lines.push(`  ${domain.padEnd(36)} ${formatScore(score).padStart(5)}`);
  }
  lines.push('');

  lines.push(...section(`FINDINGS (${report.findings.length})`));
  if (report.findings.length === 0) {
    lines.push('  No findings.');
  }
  for (const finding of report.findings) {
    lines.push(`  ${finding.id} ${finding.priority.toUpperCase().padEnd(8)} ${finding.title}`);
    lines.push(`        ${finding.recommendation}`);
  }
  lines.push('');

  if (report.warnings.length > 0) {
    lines.push(...section(`WARNINGS (${report.warnings.length})`));
    for (const warning of report.warnings) {
      lines.push(`  ${warning.file} [${warning.kind}] ${warning.message}`);
    }
    lines.push('');
  }

  if (scan) {
    lines.push(...section('SCAN INFO'));
    lines.push(`Target:     ${scan.target}`);
    lines.push(`Files:      ${scan.scannedFiles} scanned, ${scan.skippedFiles} skipped`);
    lines.push(`Matches:    ${scan.matches}`);
    lines.push(`Duration:   ${scan.duration}ms`);
    lines.push('');
  }

  return lines;
}

/**
 * Quiet mode output: critical findings only.
 */
export function renderQuietText(report: AuditReport): string[] {
  const criticals = report.findings.filter(f => f.priority === 'critical');
  if (criticals.length === 0) {
    return [];
  }
  return [
    `❌ ${criticals.length} critical finding(s) detected`,
    ...criticals.map(f => `   ${f.id} ${f.title}`),
  ];
}

export async function writeReportFile(filePath: string, report: AuditReport): Promise<string> {
  const resolved = path.resolve(filePath);
  await fs.writeFile(resolved, JSON.stringify(report, null, 2) + '\n', 'utf-8');
  return resolved;
}
