import type { ControlCatalog } from "../control_catalog";
import { FileListerError } from "../file_lister";
import type { FileLister } from "../file_lister";
import { createLogger } from "../logger/logger";
import type { Logger } from "../logger/logger";
import { DETECTORS } from "./detectors/detector_registry";
import { MAX_LINE_LENGTH, evaluateFile, normalizeDetector } from "./detectors/detector_runner";
import { DetectorConfigurationError, ScanCancelledError } from "./pattern_scanner.errors";
import { openFsTarget } from "./scan_target";
import type {
  DetectorDescriptor,
  OpenScanTarget,
  PatternScannerDependencies,
  ScanMatch,
  ScanOptions,
  ScanResult,
  ScanWarning,
} from "./pattern_scanner.types";

export const DEFAULT_EXCLUSIONS: readonly string[] = [
  "**/.git/**",
  "**/node_modules/**",
  "**/vendor/**",
  "**/venv/**",
  "**/__pycache__/**",
  "**/dist/**",
  "**/build/**",
  "**/.next/**",
];

export const DEFAULT_MAX_FILE_SIZE = 1024 * 1024;
export const DEFAULT_PER_FILE_TIMEOUT_MS = 2000;
export const DEFAULT_CONCURRENCY = 8;

/** Bytes inspected for NUL when sniffing binary content */
const BINARY_SNIFF_LENGTH = 8000;

type FileOutcome =
  | { kind: "scanned"; matches: ScanMatch[] }
  | { kind: "skipped"; warning: ScanWarning };

export function looksBinary(content: Buffer): boolean {
  return content.subarray(0, BINARY_SNIFF_LENGTH).includes(0);
}

function compareMatches(a: ScanMatch, b: ScanMatch): number {
  if (a.file !== b.file) return a.file < b.file ? -1 : 1;
  if (a.line !== b.line) return a.line - b.line;
  if (a.detectorId !== b.detectorId) return a.detectorId < b.detectorId ? -1 : 1;
  return 0;
}

/**
 * Pattern Scanner - walks a source tree and reports detector matches.
 *
 * Pipeline: Open target -> Enumerate -> Evaluate (batched) -> Merge
 *
 * Read-only: the scanned tree is never modified. Per-file problems become
 * warnings; only a bad root or cancellation stops a scan.
 */
export class PatternScanner {
  private readonly detectors: readonly DetectorDescriptor[];
  private readonly openTarget: OpenScanTarget;
  private readonly now: () => number;
  private readonly logger: Logger;

  /**
   * @throws DetectorConfigurationError if a detector maps to a control missing from the catalog
   */
  constructor(catalog: ControlCatalog, deps: PatternScannerDependencies = {}) {
    const detectors = deps.detectors ?? DETECTORS;
    for (const detector of detectors) {
      if (!catalog.has(detector.controlId)) {
        throw new DetectorConfigurationError(detector.id, detector.controlId);
      }
    }
    this.detectors = detectors.map(normalizeDetector);
    this.openTarget = deps.openTarget ?? openFsTarget;
    this.now = deps.now ?? Date.now;
    this.logger = deps.logger ?? createLogger("[PatternScanner] ");
  }

  /**
   * Scans every file under the root.
   * @throws ScanTargetError if the root cannot be scanned
   * @throws ScanCancelledError if the signal aborts; checked before each file is read and evaluated
   */
  async scan(options: ScanOptions): Promise<ScanResult> {
    const startTime = this.now();
    const lister = await this.openTarget(options.rootPath);
    const exclusions = [...(options.exclusions ?? DEFAULT_EXCLUSIONS)];
    const files = (await lister.list(["**/*"], { ignore: exclusions })).sort();
    const concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);

    this.logger.debug(`Scanning ${files.length} files under ${options.rootPath}`);

    const matches: ScanMatch[] = [];
    const warnings: ScanWarning[] = [];
    let scannedFiles = 0;
    const progress = { completed: 0 };

    for (const batch of this.createBatches(files, concurrency)) {
      this.throwIfAborted(options.signal, progress.completed);
      const outcomes = await Promise.all(batch.map((file) => this.scanFile(lister, file, options, progress)));
      for (const outcome of outcomes) {
        if (outcome.kind === "scanned") {
          scannedFiles++;
          matches.push(...outcome.matches);
        } else {
          warnings.push(outcome.warning);
          this.logger.warn(`${outcome.warning.file}: ${outcome.warning.message}`);
        }
      }
    }
    this.throwIfAborted(options.signal, progress.completed);

    const result: ScanResult = {
      matches: this.dedupe(matches.sort(compareMatches)),
      warnings,
      scannedFiles,
      skippedFiles: warnings.length,
      duration: this.now() - startTime,
    };
    this.logger.info(
      `Scanned ${result.scannedFiles} files: ${result.matches.length} matches, ${result.warnings.length} warnings`
    );
    return result;
  }

  /**
   * Reads and evaluates one file. `progress.completed` counts files already
   * finished, for the cancellation error; the signal is checked before the
   * file is read and again before detectors run.
   */
  private async scanFile(
    lister: FileLister,
    file: string,
    options: ScanOptions,
    progress: { completed: number }
  ): Promise<FileOutcome> {
    const maxFileSize = options.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
    const timeoutMs = options.perFileTimeoutMs ?? DEFAULT_PER_FILE_TIMEOUT_MS;
    const finish = (outcome: FileOutcome): FileOutcome => {
      progress.completed++;
      return outcome;
    };

    this.throwIfAborted(options.signal, progress.completed);
    let content: Buffer;
    try {
      const stats = await lister.stat(file);
      if (stats.size > maxFileSize) {
        return finish(this.skip(file, "too_large", `File is ${stats.size} bytes, limit is ${maxFileSize}`));
      }
      content = await lister.readBytes(file);
    } catch (error) {
      if (error instanceof FileListerError) {
        return finish(this.skip(file, "unreadable", error.message));
      }
      throw error;
    }

    if (looksBinary(content)) {
      return finish(this.skip(file, "binary", "Binary content skipped"));
    }

    this.throwIfAborted(options.signal, progress.completed);
    const deadline = this.now() + timeoutMs;
    const evaluation = evaluateFile(file, content.toString("utf-8"), this.detectors, () => this.now() > deadline);
    if (evaluation.kind === "timed_out") {
      return finish(this.skip(file, "timeout", `Evaluation exceeded ${timeoutMs}ms`));
    }
    if (evaluation.kind === "line_too_long") {
      return finish(
        this.skip(
          file,
          "too_large",
          `Line ${evaluation.line} is ${evaluation.length} characters, limit is ${MAX_LINE_LENGTH}`
        )
      );
    }
    return finish({ kind: "scanned", matches: evaluation.matches });
  }

  private skip(file: string, kind: ScanWarning["kind"], message: string): FileOutcome {
    return { kind: "skipped", warning: { file, kind, message } };
  }

  private throwIfAborted(signal: AbortSignal | undefined, completed: number): void {
    if (signal?.aborted) {
      throw new ScanCancelledError(completed);
    }
  }

  /**
   * Keeps the first match per (detector, file, line). Input must be sorted.
   */
  private dedupe(matches: ScanMatch[]): ScanMatch[] {
    const unique: ScanMatch[] = [];
    for (const match of matches) {
      const previous = unique[unique.length - 1];
      if (!previous || compareMatches(previous, match) !== 0) {
        unique.push(match);
      }
    }
    return unique;
  }

  /**
   * Creates batches of files for processing.
   */
  private createBatches<T>(items: T[], batchSize: number): T[][] {
    const batches: T[][] = [];
    for (let i = 0; i < items.length; i += batchSize) {
      batches.push(items.slice(i, i + batchSize));
    }
    return batches;
  }
}
