import { COMPLIANCE_STATUSES } from "./compliance_status";

/**
 * Thrown when a status outside the five-state enum is submitted.
 */
export class InvalidStatusError extends Error {
  constructor(public readonly status: unknown, public readonly controlId?: string) {
    super(
      `Invalid compliance status ${JSON.stringify(status)}${controlId ? ` for ${controlId}` : ""}. ` +
      `Expected one of: ${COMPLIANCE_STATUSES.join(", ")}`
    );
    this.name = "InvalidStatusError";
  }
}

/**
 * Thrown when an assessment file is missing, unparsable or malformed.
 */
export class AssessmentFileError extends Error {
  constructor(message: string, public readonly source: string, public readonly field?: string) {
    super(`Invalid assessment file ${source}: ${message}`);
    this.name = "AssessmentFileError";
  }
}
