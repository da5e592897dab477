/**
 * Risk class of a control. Drives finding priority.
 */
export type RiskClass = "critical" | "high" | "standard";

export const RISK_CLASSES: readonly RiskClass[] = ["critical", "high", "standard"];

/**
 * A single security requirement from the catalog. Frozen once loaded.
 */
export interface Control {
  /** Stable, domain-prefixed identifier (e.g. "CR-02") */
  readonly id: string;
  readonly domain: string;
  /** Short title */
  readonly name: string;
  readonly description: string;
  readonly riskClass: RiskClass;
  /** Framework name -> whether the control maps to it */
  readonly frameworks: Readonly<Record<string, boolean>>;
  readonly theme?: string;
  readonly controlType?: string;
  readonly implementationGuidance?: string;
  readonly testingProcedure?: string;
  readonly auditArtifacts?: string;
}

/**
 * Named grouping of controls, derived from the catalog.
 */
export interface Domain {
  readonly name: string;
  readonly controlIds: readonly string[];
}

/**
 * Control record as it appears in a catalog file.
 */
export interface RawControlRecord {
  id: string;
  domain: string;
  name: string;
  description: string;
  risk_class?: RiskClass;
  riskClass?: RiskClass;
  frameworks: Record<string, boolean>;
  theme?: string;
  control_type?: string;
  implementation_guidance?: string;
  testing_procedure?: string;
  audit_artifacts?: string;
}

export interface CatalogStatistics {
  totalControls: number;
  totalDomains: number;
  controlsPerDomain: Record<string, number>;
  controlsPerRiskClass: Record<RiskClass, number>;
  /** Number of controls flagged for each framework */
  frameworkCoverage: Record<string, number>;
}
