export type FindingPriority = "critical" | "high" | "medium" | "low";

/**
 * Severity order used for sorting, most severe first.
 */
export const FINDING_PRIORITIES: readonly FindingPriority[] = ["critical", "high", "medium", "low"];

/**
 * Actionable deficiency derived from non-compliant or partial assessments.
 */
export interface Finding {
  /** Sequential id (F-001, F-002, ...) assigned after sorting */
  id: string;
  title: string;
  /** Lists every gap of the affected controls */
  description: string;
  /** Non-empty; every id exists in the catalog */
  affectedControls: string[];
  priority: FindingPriority;
  riskImpact: string;
  recommendation: string;
  remediationEffort: string;
}

/**
 * Finding fields before an id is assigned.
 */
export type FindingDraft = Omit<Finding, "id">;
