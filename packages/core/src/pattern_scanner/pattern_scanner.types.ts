import type { FileLister } from "../file_lister";
import type { Logger } from "../logger/logger";

/**
 * Detection categories. Each maps to exactly one catalog control.
 */
export type ScanCategory =
  | "hardcoded-secret"
  | "weak-cryptography"
  | "insecure-transport"
  | "injection-risk"
  | "missing-auth-logging";

export type ScanSeverity = "critical" | "high" | "medium" | "low";

/**
 * definite: the pattern itself is the problem.
 * heuristic: the pattern suggests a problem that needs review.
 */
export type MatchConfidence = "definite" | "heuristic";

/**
 * A single detector hit. Never scored directly; matches are aggregated
 * into assessment updates first.
 */
export interface ScanMatch {
  detectorId: string;
  category: ScanCategory;
  severity: ScanSeverity;
  controlId: string;
  /** Path relative to the scan root, forward slashes */
  file: string;
  /** 1-based */
  line: number;
  /** Trimmed line with secret values redacted (max 120 chars) */
  snippet: string;
  confidence: MatchConfidence;
}

export type ScanWarningKind = "timeout" | "unreadable" | "binary" | "too_large";

/**
 * Per-file problem. The file contributes nothing to the scan result.
 */
export interface ScanWarning {
  file: string;
  kind: ScanWarningKind;
  message: string;
}

/**
 * Context handed to a detector's suppression predicate.
 */
export interface MatchContext {
  file: string;
  /** Full source line */
  line: string;
  /** Text matched by the pattern or trigger */
  matched: string;
  /** First capture group, when the pattern has one (usually the value) */
  value?: string;
}

interface DetectorBase {
  /** Stable id (e.g. "SEC-001"); match sort key after file and line */
  id: string;
  category: ScanCategory;
  severity: ScanSeverity;
  controlId: string;
  confidence: MatchConfidence;
  message: string;
  /** Lower-case file extensions this detector applies to; all files when omitted */
  appliesTo?: readonly string[];
  /** Returns true to discard a match */
  suppress?: (context: MatchContext) => boolean;
}

/**
 * Matches a pattern against each line; every matching line is a hit.
 */
export interface PatternDetector extends DetectorBase {
  kind: "pattern";
  pattern: RegExp;
}

/**
 * Fires on a trigger line when the file contains none of the indicators.
 */
export interface AbsenceDetector extends DetectorBase {
  kind: "absence";
  trigger: RegExp;
  /** Any line matching one of these clears every trigger in the file */
  indicators: readonly RegExp[];
}

export type DetectorDescriptor = PatternDetector | AbsenceDetector;

export interface ScanOptions {
  rootPath: string;
  /** Glob patterns excluded from enumeration, matched against relative paths */
  exclusions?: readonly string[];
  /** Bytes; larger files are skipped with a too_large warning */
  maxFileSize?: number;
  /** Evaluation budget per file in milliseconds */
  perFileTimeoutMs?: number;
  /** Files evaluated per batch */
  concurrency?: number;
  /** Checked between files */
  signal?: AbortSignal;
}

export interface ScanResult {
  /** Sorted by file, line, detector id */
  matches: ScanMatch[];
  /** Sorted by file */
  warnings: ScanWarning[];
  scannedFiles: number;
  skippedFiles: number;
  /** Milliseconds */
  duration: number;
}

/**
 * Opens a scan root for reading.
 * @throws ScanTargetError if the root is missing, not a directory or unreadable
 */
export type OpenScanTarget = (rootPath: string) => Promise<FileLister>;

export interface PatternScannerDependencies {
  /** Detector table (default: built-in detectors) */
  detectors?: readonly DetectorDescriptor[];
  /** Default: filesystem target through FsFileLister */
  openTarget?: OpenScanTarget;
  /** Millisecond clock used for per-file budgets */
  now?: () => number;
  logger?: Logger;
}
