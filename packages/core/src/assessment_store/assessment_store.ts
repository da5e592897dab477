import type { ControlCatalog } from "../control_catalog";
import { isComplianceStatus } from "./compliance_status";
import { InvalidStatusError } from "./assessment_store.errors";
import type {
  Assessment,
  AssessOptions,
  AssessmentStoreOptions,
} from "./assessment_store.types";

/**
 * Holds the current compliance state of every assessed control for one audit run.
 *
 * The latest write for a control id wins. Every accepted write is also
 * appended to a per-control history for audit trails. Rejected writes
 * (unknown control, invalid status) leave the store unchanged.
 */
export class AssessmentStore {
  private readonly current = new Map<string, Assessment>();
  private readonly trail = new Map<string, Assessment[]>();
  private readonly now: () => Date;

  constructor(
    private readonly catalog: ControlCatalog,
    options: AssessmentStoreOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Records the assessment of a control, replacing any previous one.
   * @throws UnknownControlError if the id is not in the catalog
   * @throws InvalidStatusError if status is not one of the five values
   */
  assess(
    controlId: string,
    status: string,
    evidence: string = "",
    gaps: readonly string[] = [],
    options: AssessOptions = {}
  ): Assessment {
    const control = this.catalog.require(controlId);
    if (!isComplianceStatus(status)) {
      throw new InvalidStatusError(status, controlId);
    }

    const record: Assessment = Object.freeze({
      controlId: control.id,
      domain: control.domain,
      controlName: control.name,
      status,
      evidence,
      gaps: Object.freeze([...gaps]),
      ...(options.notes ? { notes: options.notes } : {}),
      source: options.source ?? "manual",
      assessedAt: this.now().toISOString(),
    });

    this.current.set(control.id, record);
    const history = this.trail.get(control.id) ?? [];
    history.push(record);
    this.trail.set(control.id, history);
    return record;
  }

  /**
   * Runs the checks of {@link assess} without writing anything.
   * @throws UnknownControlError | InvalidStatusError
   */
  validate(controlId: string, status: string): void {
    this.catalog.require(controlId);
    if (!isComplianceStatus(status)) {
      throw new InvalidStatusError(status, controlId);
    }
  }

  get(controlId: string): Assessment | undefined {
    return this.current.get(controlId);
  }

  has(controlId: string): boolean {
    return this.current.has(controlId);
  }

  /**
   * Current assessments sorted by control id.
   */
  list(): Assessment[] {
    return [...this.current.values()].sort((a, b) => compareIds(a.controlId, b.controlId));
  }

  /**
   * Every accepted write for a control, oldest first.
   */
  history(controlId: string): readonly Assessment[] {
    return [...(this.trail.get(controlId) ?? [])];
  }

  get size(): number {
    return this.current.size;
  }
}

/**
 * Code-unit ordering of control ids, independent of locale.
 */
export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
