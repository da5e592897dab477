export { SchemaValidationCache, formatValidationErrors } from "./schema_cache";
export type { SchemaValidationIssue } from "./schema_cache";
