/**
 * Compliance state of a single control.
 * Closed union: every site that branches on it must handle all five values.
 */
export type ComplianceStatus =
  | "compliant"
  | "partial"
  | "non_compliant"
  | "not_applicable"
  | "not_assessed";

export const COMPLIANCE_STATUSES: readonly ComplianceStatus[] = [
  "compliant",
  "partial",
  "non_compliant",
  "not_applicable",
  "not_assessed",
];

export function isComplianceStatus(value: unknown): value is ComplianceStatus {
  return typeof value === "string" && (COMPLIANCE_STATUSES as readonly string[]).includes(value);
}

/**
 * Compile-time exhaustiveness check for switch statements.
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled value: ${String(value)}`);
}
