export {
  FindingGenerator,
  createFinding,
  priorityFor,
  recommendationFor,
  sortFindings,
} from "./finding_generator";
export { FindingValidationError } from "./finding_generator.errors";
export { FINDING_PRIORITIES } from "./finding_generator.types";
export type { Finding, FindingDraft, FindingPriority } from "./finding_generator.types";
