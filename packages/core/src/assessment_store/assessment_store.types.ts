import type { ComplianceStatus } from "./compliance_status";

/**
 * Who produced an assessment.
 * - manual: questionnaire answers, assessment files, direct API calls
 * - scanner: aggregated pattern scanner matches
 */
export type AssessmentSource = "manual" | "scanner";

/**
 * Current compliance record of one control in one audit run.
 */
export interface Assessment {
  readonly controlId: string;
  readonly domain: string;
  readonly controlName: string;
  readonly status: ComplianceStatus;
  /** Free text or references supporting the status */
  readonly evidence: string;
  /** Ordered deficiencies; drive finding generation */
  readonly gaps: readonly string[];
  readonly notes?: string;
  readonly source: AssessmentSource;
  /** ISO timestamp of the write */
  readonly assessedAt: string;
}

export interface AssessOptions {
  source?: AssessmentSource;
  notes?: string;
}

export interface AssessmentStoreOptions {
  /** Clock used for assessedAt (default: current time) */
  now?: () => Date;
}

/**
 * Descriptive metadata about the system under audit.
 * Appears in report headers; never used in scoring.
 */
export interface Scope {
  name: string;
  criticality: "critical" | "high" | "medium" | "low";
  /** Data classes handled (e.g. "PII", "Payment Data") */
  dataClasses: string[];
  /** Frameworks the system must comply with (e.g. "SOC 2") */
  frameworksRequired: string[];
  primaryFunction?: string;
  architecture?: string;
  deploymentEnvironment?: string;
  userBase?: string;
  additionalContext?: string;
}

/**
 * One entry of an assessment file.
 */
export interface AssessmentEntry {
  controlId: string;
  status: string;
  evidence?: string;
  gaps?: string[];
  notes?: string;
}

/**
 * Assessment file contents: the output of a questionnaire run.
 */
export interface AssessmentFile {
  scope?: Scope;
  assessments: AssessmentEntry[];
}
