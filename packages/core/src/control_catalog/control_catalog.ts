import * as fs from "fs/promises";
import { existsSync } from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import { SchemaValidationCache, formatValidationErrors } from "../schemas/schema_cache";
import { CONTROL_RECORD_SCHEMA } from "./control_catalog.schema";
import { CatalogLoadError, UnknownControlError } from "./control_catalog.errors";
import type {
  CatalogStatistics,
  Control,
  Domain,
  RawControlRecord,
  RiskClass,
} from "./control_catalog.types";

const BUNDLED_CATALOG = path.join("catalog", "controls.json");

function toControl(record: RawControlRecord): Control {
  const control: {
    -readonly [K in keyof Control]: Control[K];
  } = {
    id: record.id.trim(),
    domain: record.domain.trim(),
    name: record.name.trim(),
    description: record.description.trim(),
    riskClass: record.risk_class ?? record.riskClass ?? "standard",
    frameworks: Object.freeze({ ...record.frameworks }),
  };
  if (record.theme) control.theme = record.theme;
  if (record.control_type) control.controlType = record.control_type;
  if (record.implementation_guidance) control.implementationGuidance = record.implementation_guidance;
  if (record.testing_procedure) control.testingProcedure = record.testing_procedure;
  if (record.audit_artifacts) control.auditArtifacts = record.audit_artifacts;
  return Object.freeze(control);
}

function describeRecord(record: unknown, index: number): string {
  if (typeof record === "object" && record !== null && "id" in record && typeof record.id === "string") {
    return `control #${index + 1} (${record.id})`;
  }
  return `control #${index + 1}`;
}

/**
 * Immutable, indexed set of controls grouped into domains.
 *
 * Built once through {@link ControlCatalog.fromRecords} or
 * {@link loadControlCatalog}; any malformed record aborts construction,
 * so a catalog instance never covers only part of its input. Instances hold
 * no mutable state and can be shared by any number of audit sessions.
 */
export class ControlCatalog {
  private readonly byId: ReadonlyMap<string, Control>;
  private readonly byDomain: ReadonlyMap<string, Domain>;
  private readonly ordered: readonly Control[];

  private constructor(controls: Control[], readonly source: string) {
    this.ordered = Object.freeze([...controls]);
    this.byId = new Map(controls.map((c) => [c.id, c]));

    const grouped = new Map<string, string[]>();
    for (const control of controls) {
      const ids = grouped.get(control.domain) ?? [];
      ids.push(control.id);
      grouped.set(control.domain, ids);
    }
    this.byDomain = new Map(
      [...grouped.entries()].map(([name, ids]) => [
        name,
        Object.freeze({ name, controlIds: Object.freeze(ids) }),
      ])
    );
  }

  /**
   * Validates raw records and builds the catalog.
   * @throws CatalogLoadError on missing fields, wrong types, duplicate ids or an empty list
   */
  static fromRecords(records: unknown, source: string = "<inline>"): ControlCatalog {
    if (!Array.isArray(records)) {
      throw new CatalogLoadError("expected a list of control records", source);
    }
    if (records.length === 0) {
      throw new CatalogLoadError("catalog contains no controls", source);
    }

    const validate = SchemaValidationCache.getValidator<RawControlRecord>(
      "control_record",
      CONTROL_RECORD_SCHEMA
    );
    const controls: Control[] = [];
    const seen = new Set<string>();

    records.forEach((record: unknown, index) => {
      if (!validate(record)) {
        const [issue] = formatValidationErrors(validate.errors);
        const field = issue?.field ?? "root";
        throw new CatalogLoadError(
          `${describeRecord(record, index)} field ${field} ${issue?.message ?? "is invalid"}`,
          source,
          field
        );
      }
      if (record.risk_class && record.riskClass && record.risk_class !== record.riskClass) {
        throw new CatalogLoadError(
          `${describeRecord(record, index)} field /riskClass (${record.riskClass}) conflicts with risk_class (${record.risk_class})`,
          source,
          "/riskClass"
        );
      }
      const control = toControl(record);
      if (seen.has(control.id)) {
        throw new CatalogLoadError(
          `${describeRecord(record, index)} duplicates id ${control.id}`,
          source,
          "/id"
        );
      }
      seen.add(control.id);
      controls.push(control);
    });

    return new ControlCatalog(controls, source);
  }

  get size(): number {
    return this.ordered.length;
  }

  has(controlId: string): boolean {
    return this.byId.has(controlId);
  }

  get(controlId: string): Control | undefined {
    return this.byId.get(controlId);
  }

  /**
   * @throws UnknownControlError
   */
  require(controlId: string): Control {
    const control = this.byId.get(controlId);
    if (!control) {
      throw new UnknownControlError(controlId);
    }
    return control;
  }

  /** All controls in catalog order. */
  controls(): readonly Control[] {
    return this.ordered;
  }

  /** Domain names, sorted. */
  domains(): string[] {
    return [...this.byDomain.keys()].sort();
  }

  domain(name: string): Domain | undefined {
    return this.byDomain.get(name);
  }

  controlsInDomain(name: string): Control[] {
    const domain = this.byDomain.get(name);
    if (!domain) return [];
    return domain.controlIds.map((id) => this.require(id));
  }

  statistics(): CatalogStatistics {
    const controlsPerDomain: Record<string, number> = {};
    for (const name of this.domains()) {
      controlsPerDomain[name] = this.byDomain.get(name)?.controlIds.length ?? 0;
    }

    const controlsPerRiskClass: Record<RiskClass, number> = { critical: 0, high: 0, standard: 0 };
    const frameworkCoverage: Record<string, number> = {};
    for (const control of this.ordered) {
      controlsPerRiskClass[control.riskClass]++;
      for (const [framework, applies] of Object.entries(control.frameworks)) {
        frameworkCoverage[framework] = (frameworkCoverage[framework] ?? 0) + (applies ? 1 : 0);
      }
    }

    return {
      totalControls: this.ordered.length,
      totalDomains: this.byDomain.size,
      controlsPerDomain,
      controlsPerRiskClass,
      frameworkCoverage,
    };
  }
}

/**
 * Parses catalog file content. Accepts either a top-level list of records
 * or an object with a `controls` list.
 */
export function parseCatalogContent(content: string, source: string): unknown {
  const ext = path.extname(source).toLowerCase();
  let parsed: unknown;
  try {
    parsed = ext === ".yaml" || ext === ".yml" ? yaml.load(content) : JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CatalogLoadError(`could not be parsed: ${reason}`, source);
  }

  if (Array.isArray(parsed)) {
    return parsed;
  }
  if (typeof parsed === "object" && parsed !== null && "controls" in parsed) {
    return parsed.controls;
  }
  throw new CatalogLoadError("expected a list of controls or an object with a 'controls' list", source);
}

/**
 * Loads a catalog from a JSON or YAML file.
 * @throws CatalogLoadError if the file is missing or malformed
 */
export async function loadControlCatalog(filePath: string): Promise<ControlCatalog> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CatalogLoadError(`could not be read: ${reason}`, filePath);
  }
  return ControlCatalog.fromRecords(parseCatalogContent(content, filePath), filePath);
}

/**
 * Finds the catalog shipped with the repository by searching upwards
 * from `startDir` for catalog/controls.json.
 * @returns Absolute path, or null if not found
 */
export function resolveBundledCatalogPath(startDir: string = __dirname): string | null {
  let currentPath = path.resolve(startDir);
  while (true) {
    const candidate = path.join(currentPath, BUNDLED_CATALOG);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = path.dirname(currentPath);
    if (parent === currentPath) {
      return null;
    }
    currentPath = parent;
  }
}
