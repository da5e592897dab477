export {
  PatternScanner,
  DEFAULT_CONCURRENCY,
  DEFAULT_EXCLUSIONS,
  DEFAULT_MAX_FILE_SIZE,
  DEFAULT_PER_FILE_TIMEOUT_MS,
  looksBinary,
} from "./pattern_scanner";
export { openFsTarget } from "./scan_target";
export { aggregateMatches, DEFAULT_MAX_EVIDENCE_LOCATIONS } from "./match_aggregator";
export type { AggregateOptions, ControlUpdate } from "./match_aggregator";
export {
  CATEGORY_CONTROLS,
  CATEGORY_GAPS,
  DETECTORS,
  SOURCE_EXTENSIONS,
} from "./detectors/detector_registry";
export { MAX_LINE_LENGTH, evaluateFile, fileExtension } from "./detectors/detector_runner";
export type { FileEvaluation } from "./detectors/detector_runner";
export { isPlaceholderValue, isTestPath, redactSecrets, toSnippet, TEST_PATH_GLOBS } from "./detectors/suppression";
export {
  DetectorConfigurationError,
  ScanCancelledError,
  ScanTargetError,
} from "./pattern_scanner.errors";
export type {
  AbsenceDetector,
  DetectorDescriptor,
  MatchConfidence,
  MatchContext,
  OpenScanTarget,
  PatternDetector,
  PatternScannerDependencies,
  ScanCategory,
  ScanMatch,
  ScanOptions,
  ScanResult,
  ScanSeverity,
  ScanWarning,
  ScanWarningKind,
} from "./pattern_scanner.types";
