/**
 * Thrown when a finding is built from an invalid set of affected controls.
 */
export class FindingValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FindingValidationError";
  }
}
