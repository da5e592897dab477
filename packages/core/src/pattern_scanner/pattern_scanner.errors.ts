/**
 * Thrown when the scan root is missing, not a directory or unreadable.
 * Fatal: nothing has been scanned.
 */
export class ScanTargetError extends Error {
  constructor(message: string, public readonly rootPath: string) {
    super(`Cannot scan ${rootPath}: ${message}`);
    this.name = "ScanTargetError";
  }
}

/**
 * Thrown when a scan is aborted through its AbortSignal.
 * No partial result is returned.
 */
export class ScanCancelledError extends Error {
  constructor(public readonly filesCompleted: number) {
    super(`Scan cancelled after ${filesCompleted} files`);
    this.name = "ScanCancelledError";
  }
}

/**
 * Thrown when a detector table refers to a control missing from the catalog.
 */
export class DetectorConfigurationError extends Error {
  constructor(public readonly detectorId: string, public readonly controlId: string) {
    super(`Detector ${detectorId} maps to unknown control ${controlId}`);
    this.name = "DetectorConfigurationError";
  }
}
