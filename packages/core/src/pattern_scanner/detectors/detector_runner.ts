import * as path from "path";
import type { DetectorDescriptor, MatchContext, ScanMatch } from "../pattern_scanner.types";
import { toSnippet } from "./suppression";

/** Lines longer than this are never handed to a detector pattern */
export const MAX_LINE_LENGTH = 4096;

/**
 * Outcome of evaluating one file.
 * A timed-out file or one with an over-long line keeps none of its matches.
 */
export type FileEvaluation =
  | { kind: "completed"; matches: ScanMatch[] }
  | { kind: "timed_out" }
  | { kind: "line_too_long"; line: number; length: number };

/**
 * Lower-case extension of a relative path. Extensionless dotfiles
 * (`.env`) count as their own extension.
 */
export function fileExtension(file: string): string {
  const base = path.posix.basename(file);
  const ext = path.posix.extname(base);
  if (ext) return ext.toLowerCase();
  return base.startsWith(".") ? base.toLowerCase() : "";
}

export function appliesToFile(detector: DetectorDescriptor, file: string): boolean {
  return !detector.appliesTo || detector.appliesTo.includes(fileExtension(file));
}

function toMatch(detector: DetectorDescriptor, file: string, lineIndex: number, line: string): ScanMatch {
  return {
    detectorId: detector.id,
    category: detector.category,
    severity: detector.severity,
    controlId: detector.controlId,
    file,
    line: lineIndex + 1,
    snippet: toSnippet(line),
    confidence: detector.confidence,
  };
}

function contextOf(file: string, line: string, match: RegExpExecArray): MatchContext {
  const context: MatchContext = { file, line, matched: match[0] };
  if (match[1] !== undefined) context.value = match[1];
  return context;
}

/**
 * Runs every applicable detector over a file's lines.
 *
 * `expired` is polled before each line of each detector; once it returns
 * true evaluation stops and the file is reported as timed out. A single
 * regex call cannot be interrupted, so files with a line over
 * {@link MAX_LINE_LENGTH} characters (minified bundles, generated data)
 * are rejected before any pattern runs.
 */
export function evaluateFile(
  file: string,
  content: string,
  detectors: readonly DetectorDescriptor[],
  expired: () => boolean
): FileEvaluation {
  const lines = content.split(/\r?\n/);
  const longLine = lines.findIndex((line) => line.length > MAX_LINE_LENGTH);
  if (longLine !== -1) {
    return { kind: "line_too_long", line: longLine + 1, length: lines[longLine]?.length ?? 0 };
  }
  const matches: ScanMatch[] = [];

  for (const detector of detectors) {
    if (!appliesToFile(detector, file)) continue;

    if (detector.kind === "pattern") {
      for (let i = 0; i < lines.length; i++) {
        if (expired()) return { kind: "timed_out" };
        const line = lines[i] ?? "";
        const match = detector.pattern.exec(line);
        if (!match) continue;
        if (detector.suppress?.(contextOf(file, line, match))) continue;
        matches.push(toMatch(detector, file, i, line));
      }
      continue;
    }

    const triggers: Array<{ index: number; line: string; match: RegExpExecArray }> = [];
    let indicated = false;
    for (let i = 0; i < lines.length && !indicated; i++) {
      if (expired()) return { kind: "timed_out" };
      const line = lines[i] ?? "";
      if (detector.indicators.some((indicator) => indicator.test(line))) {
        indicated = true;
        break;
      }
      const match = detector.trigger.exec(line);
      if (match) triggers.push({ index: i, line, match });
    }
    if (indicated) continue;

    for (const trigger of triggers) {
      if (detector.suppress?.(contextOf(file, trigger.line, trigger.match))) continue;
      matches.push(toMatch(detector, file, trigger.index, trigger.line));
    }
  }

  return { kind: "completed", matches };
}

function withoutState(pattern: RegExp): RegExp {
  return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ""));
}

/**
 * Copies a detector with global and sticky flags dropped, so patterns can be
 * reused across lines without carrying lastIndex between calls.
 */
export function normalizeDetector(detector: DetectorDescriptor): DetectorDescriptor {
  if (detector.kind === "pattern") {
    return { ...detector, pattern: withoutState(detector.pattern) };
  }
  return {
    ...detector,
    trigger: withoutState(detector.trigger),
    indicators: detector.indicators.map(withoutState),
  };
}
