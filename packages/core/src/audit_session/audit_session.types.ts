import type { Assessment, AssessmentStoreOptions, Scope } from "../assessment_store";
import type { Finding } from "../finding_generator";
import type { ControlUpdate, ScanWarning } from "../pattern_scanner";
import type { Score, ScoreSummary } from "../scoring";

export interface AuditSessionOptions extends AssessmentStoreOptions {
  scope?: Scope;
  /** Locations listed in scanner evidence (default 10) */
  maxEvidenceLocations?: number;
}

/**
 * Outcome of merging a scan into the session.
 */
export interface ScanMergeResult {
  updates: ControlUpdate[];
  /** Control ids written, sorted */
  updatedControls: string[];
}

/**
 * Report data contract consumed by renderers.
 */
export interface AuditReport {
  scope: Scope | null;
  /** ISO timestamp */
  generatedAt: string;
  scores: {
    overall: Score;
    byDomain: Record<string, Score>;
  };
  summary: ScoreSummary;
  /** Sorted by control id */
  assessments: Assessment[];
  /** Sorted by priority, then control id */
  findings: Finding[];
  warnings: ScanWarning[];
}
