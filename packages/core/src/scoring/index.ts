export { ScoringEngine, computeScore, postureLabel, roundScore, statusPoints } from "./scoring_engine";
export type { PostureLabel, Score, ScoreSummary, StatusCounts } from "./scoring.types";
