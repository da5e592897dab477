import { compareIds } from "../assessment_store/assessment_store";
import { CATEGORY_GAPS } from "./detectors/detector_registry";
import type { ScanCategory, ScanMatch } from "./pattern_scanner.types";

export const DEFAULT_MAX_EVIDENCE_LOCATIONS = 10;

/**
 * Assessment update derived from every match against one control.
 */
export interface ControlUpdate {
  controlId: string;
  status: "non_compliant" | "partial";
  evidence: string;
  gaps: string[];
  /** Matches behind this update */
  matchCount: number;
}

export interface AggregateOptions {
  /** Distinct file:line locations listed in evidence */
  maxEvidenceLocations?: number;
}

function describeGap(category: ScanCategory, occurrences: number): string {
  return `${CATEGORY_GAPS[category]} (${occurrences} ${occurrences === 1 ? "occurrence" : "occurrences"})`;
}

/**
 * Collapses matches into exactly one update per mapped control.
 *
 * Status is non_compliant when any match is definite, otherwise partial.
 * Evidence lists distinct locations in match order, capped; gaps hold one
 * line per distinct category. Controls without matches get no update.
 * Output is sorted by control id.
 */
export function aggregateMatches(
  matches: readonly ScanMatch[],
  options: AggregateOptions = {}
): ControlUpdate[] {
  const maxLocations = options.maxEvidenceLocations ?? DEFAULT_MAX_EVIDENCE_LOCATIONS;
  const byControl = new Map<string, ScanMatch[]>();
  for (const match of matches) {
    const group = byControl.get(match.controlId) ?? [];
    group.push(match);
    byControl.set(match.controlId, group);
  }

  return [...byControl.entries()]
    .sort(([a], [b]) => compareIds(a, b))
    .map(([controlId, group]): ControlUpdate => {
      const locations = [...new Set(group.map((m) => `${m.file}:${m.line}`))];
      const listed = locations.slice(0, maxLocations).join(", ");
      const hidden = locations.length - Math.min(locations.length, maxLocations);

      const perCategory = new Map<ScanCategory, number>();
      for (const match of group) {
        perCategory.set(match.category, (perCategory.get(match.category) ?? 0) + 1);
      }

      return {
        controlId,
        status: group.some((m) => m.confidence === "definite") ? "non_compliant" : "partial",
        evidence: `Pattern scanner matches: ${listed}${hidden > 0 ? ` (+${hidden} more)` : ""}`,
        gaps: [...perCategory.entries()]
          .sort(([a], [b]) => compareIds(a, b))
          .map(([category, count]) => describeGap(category, count)),
        matchCount: group.length,
      };
    });
}
