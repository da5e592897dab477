import type { ControlCatalog } from "../control_catalog";
import { compareIds } from "../assessment_store/assessment_store";
import { assertNever } from "../assessment_store/compliance_status";
import type { ComplianceStatus } from "../assessment_store/compliance_status";
import type { Assessment } from "../assessment_store/assessment_store.types";
import type { PostureLabel, Score, ScoreSummary, StatusCounts } from "./scoring.types";

const WEAK_DOMAIN_THRESHOLD = 60;
const MAX_WEAK_DOMAINS = 3;

/**
 * Points a status contributes to a mean, or null when it is excluded
 * from both numerator and denominator.
 */
export function statusPoints(status: ComplianceStatus): number | null {
  switch (status) {
    case "compliant":
      return 100;
    case "partial":
      return 50;
    case "non_compliant":
      return 0;
    case "not_assessed":
      return 0;
    case "not_applicable":
      return null;
    default:
      return assertNever(status);
  }
}

export function roundScore(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Mean points of a set of assessments, skipping not_applicable.
 */
export function computeScore(assessments: readonly Assessment[]): Score {
  let total = 0;
  let counted = 0;
  let notApplicable = 0;
  for (const assessment of assessments) {
    const points = statusPoints(assessment.status);
    if (points === null) {
      notApplicable++;
      continue;
    }
    total += points;
    counted++;
  }

  if (counted === 0) {
    return { kind: "insufficient_data" };
  }
  return {
    kind: "scored",
    value: roundScore(total / counted),
    scoredControls: counted,
    notApplicable,
  };
}

export function postureLabel(score: Score): PostureLabel {
  if (score.kind === "insufficient_data") return "Insufficient Data";
  if (score.value >= 90) return "Excellent";
  if (score.value >= 75) return "Good";
  if (score.value >= 60) return "Fair";
  if (score.value >= 40) return "Poor";
  return "Critical";
}

/**
 * Turns recorded assessments into domain and overall scores.
 *
 * The overall score is a flat mean over every scorable control, not a mean
 * of domain means, so large domains weigh in proportion to their size.
 * Stateless: callers pass the current assessment list on each call.
 */
export class ScoringEngine {
  constructor(private readonly catalog: ControlCatalog) {}

  domainScore(domain: string, assessments: readonly Assessment[]): Score {
    return computeScore(assessments.filter((a) => a.domain === domain));
  }

  overallScore(assessments: readonly Assessment[]): Score {
    return computeScore(assessments);
  }

  /**
   * Scores for every catalog domain, in sorted domain order.
   * Domains with nothing recorded report insufficient data.
   */
  allDomainScores(assessments: readonly Assessment[]): Record<string, Score> {
    const scores: Record<string, Score> = {};
    for (const domain of this.catalog.domains()) {
      scores[domain] = this.domainScore(domain, assessments);
    }
    return scores;
  }

  summarize(assessments: readonly Assessment[]): ScoreSummary {
    const statusCounts: StatusCounts = {
      compliant: 0,
      partial: 0,
      non_compliant: 0,
      not_applicable: 0,
      not_assessed: 0,
    };
    for (const assessment of assessments) {
      statusCounts[assessment.status]++;
    }

    const overall = this.overallScore(assessments);
    const weakestDomains = Object.entries(this.allDomainScores(assessments))
      .flatMap(([domain, score]) =>
        score.kind === "scored" && score.value < WEAK_DOMAIN_THRESHOLD
          ? [{ domain, score: score.value }]
          : []
      )
      .sort((a, b) => a.score - b.score || compareIds(a.domain, b.domain))
      .slice(0, MAX_WEAK_DOMAINS);

    return {
      overall,
      posture: postureLabel(overall),
      statusCounts,
      totalAssessed: assessments.length,
      weakestDomains,
    };
  }
}
