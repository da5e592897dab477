/**
 * JSON schema for a single catalog record (snake_case, as produced by the
 * catalog ETL). `riskClass` is accepted as an alias of `risk_class`.
 * Unknown properties are ignored.
 */
export const CONTROL_RECORD_SCHEMA = {
  type: "object",
  required: ["id", "domain", "name", "description", "frameworks"],
  properties: {
    id: { type: "string", minLength: 1, pattern: "\\S" },
    domain: { type: "string", minLength: 1, pattern: "\\S" },
    name: { type: "string", minLength: 1, pattern: "\\S" },
    description: { type: "string" },
    risk_class: { type: "string", enum: ["critical", "high", "standard"] },
    riskClass: { type: "string", enum: ["critical", "high", "standard"] },
    frameworks: {
      type: "object",
      additionalProperties: { type: "boolean" },
    },
    theme: { type: "string" },
    control_type: { type: "string" },
    implementation_guidance: { type: "string" },
    testing_procedure: { type: "string" },
    audit_artifacts: { type: "string" },
  },
} as const;
