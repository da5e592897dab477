import type { Control, ControlCatalog } from "../control_catalog";
import { compareIds } from "../assessment_store/assessment_store";
import { assertNever } from "../assessment_store/compliance_status";
import type { Assessment } from "../assessment_store/assessment_store.types";
import type { RiskClass } from "../control_catalog/control_catalog.types";
import { FindingValidationError } from "./finding_generator.errors";
import { FINDING_PRIORITIES } from "./finding_generator.types";
import type { Finding, FindingDraft, FindingPriority } from "./finding_generator.types";

type GapStatus = "partial" | "non_compliant";

/**
 * Priority of a finding from the control's status and risk class.
 *
 * | status        | critical | high   | standard |
 * |---------------|----------|--------|----------|
 * | non_compliant | critical | high   | medium   |
 * | partial       | high     | medium | low      |
 */
export function priorityFor(status: GapStatus, riskClass: RiskClass): FindingPriority {
  switch (status) {
    case "non_compliant":
      switch (riskClass) {
        case "critical":
          return "critical";
        case "high":
          return "high";
        case "standard":
          return "medium";
        default:
          return assertNever(riskClass);
      }
    case "partial":
      switch (riskClass) {
        case "critical":
          return "high";
        case "high":
          return "medium";
        case "standard":
          return "low";
        default:
          return assertNever(riskClass);
      }
    default:
      return assertNever(status);
  }
}

function riskImpactFor(status: GapStatus, riskClass: RiskClass): string {
  if (riskClass === "standard") {
    return status === "non_compliant"
      ? "Medium - Could impact security posture"
      : "Low - Minor security risk";
  }
  return status === "non_compliant"
    ? "High - Could lead to data breach or unauthorized access"
    : "Medium - Increased risk of security incidents";
}

function effortFor(status: GapStatus): string {
  return status === "non_compliant"
    ? "High - Significant implementation required"
    : "Medium - Enhancement of existing controls";
}

/**
 * First sentence of the control's implementation guidance, or a generic line.
 */
export function recommendationFor(control: Control): string {
  const guidance = control.implementationGuidance?.trim();
  if (guidance) {
    const match = /^.*?[.!?](?=\s|$)/s.exec(guidance);
    return (match ? match[0] : guidance).replace(/\s+/g, " ");
  }
  return `Implement ${control.name} according to the control guidance.`;
}

function isGapStatus(status: Assessment["status"]): status is GapStatus {
  return status === "partial" || status === "non_compliant";
}

/**
 * Builds a finding draft after checking the affected-control set.
 * @throws FindingValidationError if no controls are given
 * @throws UnknownControlError if any control id is not in the catalog
 */
export function createFinding(
  catalog: ControlCatalog,
  fields: Omit<FindingDraft, "affectedControls">,
  affectedControls: readonly string[]
): FindingDraft {
  if (affectedControls.length === 0) {
    throw new FindingValidationError(`Finding "${fields.title}" has no affected controls`);
  }
  for (const controlId of affectedControls) {
    catalog.require(controlId);
  }
  return { ...fields, affectedControls: [...affectedControls] };
}

/**
 * Derives prioritized findings from the current assessments.
 *
 * One finding per partial or non-compliant control with at least one gap;
 * the finding lists every gap. Output is sorted by priority, then control id,
 * and numbered after sorting, so the same input always yields the same list.
 */
export class FindingGenerator {
  constructor(private readonly catalog: ControlCatalog) {}

  generate(assessments: readonly Assessment[]): Finding[] {
    const drafts: FindingDraft[] = [];
    for (const assessment of assessments) {
      const { status } = assessment;
      if (!isGapStatus(status) || assessment.gaps.length === 0) continue;

      const control = this.catalog.require(assessment.controlId);
      const label = status === "non_compliant" ? "Non-compliant" : "Partially compliant";
      drafts.push(
        createFinding(
          this.catalog,
          {
            title: `${control.name} (${control.id})`,
            description:
              `${label}: ${control.name}. Identified gaps:\n` +
              assessment.gaps.map((gap) => `- ${gap}`).join("\n"),
            priority: priorityFor(status, control.riskClass),
            riskImpact: riskImpactFor(status, control.riskClass),
            recommendation: recommendationFor(control),
            remediationEffort: effortFor(status),
          },
          [control.id]
        )
      );
    }

    return sortFindings(drafts).map((draft, index) => ({
      id: `F-${String(index + 1).padStart(3, "0")}`,
      ...draft,
    }));
  }
}

/**
 * Priority severity descending, then first affected control id ascending.
 */
export function sortFindings<T extends FindingDraft>(findings: readonly T[]): T[] {
  return [...findings].sort(
    (a, b) =>
      FINDING_PRIORITIES.indexOf(a.priority) - FINDING_PRIORITIES.indexOf(b.priority) ||
      compareIds(a.affectedControls[0] ?? "", b.affectedControls[0] ?? "")
  );
}
