/**
 * Score of a domain or of the whole audit.
 * A set with no scorable controls is a distinct state, never zero.
 */
export type Score =
  | {
      kind: "scored";
      /** 0–100, rounded to one decimal */
      value: number;
      /** Controls that counted towards the mean */
      scoredControls: number;
      /** Controls excluded as not applicable */
      notApplicable: number;
    }
  | { kind: "insufficient_data" };

export type PostureLabel = "Excellent" | "Good" | "Fair" | "Poor" | "Critical" | "Insufficient Data";

export interface StatusCounts {
  compliant: number;
  partial: number;
  non_compliant: number;
  not_applicable: number;
  not_assessed: number;
}

/**
 * Executive summary of an audit's scores.
 */
export interface ScoreSummary {
  overall: Score;
  posture: PostureLabel;
  statusCounts: StatusCounts;
  totalAssessed: number;
  /** Lowest-scoring domains below the weak threshold, weakest first (max 3) */
  weakestDomains: Array<{ domain: string; score: number }>;
}
