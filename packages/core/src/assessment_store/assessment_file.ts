import * as fs from "fs/promises";
import * as path from "path";
import * as yaml from "js-yaml";
import { SchemaValidationCache, formatValidationErrors } from "../schemas/schema_cache";
import { AssessmentFileError } from "./assessment_store.errors";
import type { AssessmentStore } from "./assessment_store";
import type { Assessment, AssessmentEntry, AssessmentFile } from "./assessment_store.types";

export const SCOPE_SCHEMA = {
  type: "object",
  required: ["name", "criticality", "dataClasses", "frameworksRequired"],
  properties: {
    name: { type: "string", minLength: 1 },
    criticality: { type: "string", enum: ["critical", "high", "medium", "low"] },
    dataClasses: { type: "array", items: { type: "string" } },
    frameworksRequired: { type: "array", items: { type: "string" } },
    primaryFunction: { type: "string" },
    architecture: { type: "string" },
    deploymentEnvironment: { type: "string" },
    userBase: { type: "string" },
    additionalContext: { type: "string" },
  },
} as const;

export const ASSESSMENT_FILE_SCHEMA = {
  type: "object",
  required: ["assessments"],
  properties: {
    scope: SCOPE_SCHEMA,
    assessments: {
      type: "array",
      items: {
        type: "object",
        required: ["controlId", "status"],
        properties: {
          controlId: { type: "string", minLength: 1 },
          status: { type: "string" },
          evidence: { type: "string" },
          gaps: { type: "array", items: { type: "string" } },
          notes: { type: "string" },
        },
      },
    },
  },
} as const;

/**
 * Parses and validates assessment file content (JSON or YAML by extension).
 * @throws AssessmentFileError
 */
export function parseAssessmentFile(content: string, source: string): AssessmentFile {
  const ext = path.extname(source).toLowerCase();
  let parsed: unknown;
  try {
    parsed = ext === ".yaml" || ext === ".yml" ? yaml.load(content) : JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new AssessmentFileError(`could not be parsed: ${reason}`, source);
  }

  const validate = SchemaValidationCache.getValidator<AssessmentFile>(
    "assessment_file",
    ASSESSMENT_FILE_SCHEMA
  );
  if (!validate(parsed)) {
    const [issue] = formatValidationErrors(validate.errors);
    throw new AssessmentFileError(
      `field ${issue?.field ?? "root"} ${issue?.message ?? "is invalid"}`,
      source,
      issue?.field
    );
  }
  return parsed;
}

/**
 * Reads an assessment file from disk.
 * @throws AssessmentFileError
 */
export async function loadAssessmentFile(filePath: string): Promise<AssessmentFile> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new AssessmentFileError(`could not be read: ${reason}`, filePath);
  }
  return parseAssessmentFile(content, filePath);
}

/**
 * Applies entries to the store. All entries are checked first, so one bad
 * entry rejects the whole batch and leaves the store unchanged.
 * @throws UnknownControlError | InvalidStatusError
 */
export function applyAssessmentEntries(
  store: AssessmentStore,
  entries: readonly AssessmentEntry[]
): Assessment[] {
  for (const entry of entries) {
    store.validate(entry.controlId, entry.status);
  }

  return entries.map((entry) =>
    store.assess(
      entry.controlId,
      entry.status,
      entry.evidence ?? "",
      entry.gaps ?? [],
      entry.notes ? { notes: entry.notes, source: "manual" } : { source: "manual" }
    )
  );
}
