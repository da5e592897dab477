import { AssessmentStore, applyAssessmentEntries } from "../assessment_store";
import type { Assessment, AssessmentFile, Scope } from "../assessment_store";
import type { ControlCatalog } from "../control_catalog";
import { FindingGenerator } from "../finding_generator";
import type { Finding } from "../finding_generator";
import { createLogger } from "../logger";
import { aggregateMatches } from "../pattern_scanner";
import type { ControlUpdate, ScanMatch, ScanWarning } from "../pattern_scanner";
import { ScoringEngine } from "../scoring";
import type { Score, ScoreSummary } from "../scoring";
import type { AuditReport, AuditSessionOptions, ScanMergeResult } from "./audit_session.types";

const logger = createLogger("[AuditSession] ");

/**
 * Context of one audit run: catalog reference, scope and assessment store.
 *
 * Sessions share only the catalog; each owns its store.
 *
 * @example
 * ```typescript
 * const session = new AuditSession(catalog, { scope });
 * session.assess("IAM-01", "partial", "MFA for admins only", ["No MFA for staff"]);
 * const { matches, warnings } = await scanner.scan({ rootPath: "./repo" });
 * session.applyScan(matches);
 * const report = session.buildReport(warnings);
 * ```
 */
export class AuditSession {
  private readonly store: AssessmentStore;
  private readonly scoring: ScoringEngine;
  private readonly findingGenerator: FindingGenerator;
  private readonly now: () => Date;
  private readonly maxEvidenceLocations: number | undefined;
  private currentScope: Scope | null;

  constructor(
    readonly catalog: ControlCatalog,
    options: AuditSessionOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.store = new AssessmentStore(catalog, { now: this.now });
    this.scoring = new ScoringEngine(catalog);
    this.findingGenerator = new FindingGenerator(catalog);
    this.maxEvidenceLocations = options.maxEvidenceLocations;
    this.currentScope = options.scope ?? null;
  }

  get scope(): Scope | null {
    return this.currentScope;
  }

  setScope(scope: Scope): void {
    this.currentScope = scope;
  }

  /**
   * Records a manual assessment.
   * @throws UnknownControlError | InvalidStatusError
   */
  assess(controlId: string, status: string, evidence: string = "", gaps: readonly string[] = [], notes?: string): Assessment {
    return this.store.assess(controlId, status, evidence, gaps, {
      source: "manual",
      ...(notes ? { notes } : {}),
    });
  }

  /**
   * Applies an assessment file. Its scope, when present, replaces the
   * session scope. Nothing is written if any entry is invalid.
   */
  applyAssessmentFile(file: AssessmentFile): Assessment[] {
    const applied = applyAssessmentEntries(this.store, file.assessments);
    if (file.scope) {
      this.currentScope = file.scope;
    }
    return applied;
  }

  /**
   * Aggregates scanner matches and writes one update per matched control.
   * Controls without matches keep their current assessment.
   */
  applyScan(matches: readonly ScanMatch[]): ScanMergeResult {
    const updates = aggregateMatches(
      matches,
      this.maxEvidenceLocations !== undefined ? { maxEvidenceLocations: this.maxEvidenceLocations } : {}
    );
    return this.applyUpdates(updates);
  }

  applyUpdates(updates: readonly ControlUpdate[]): ScanMergeResult {
    for (const update of updates) {
      this.store.validate(update.controlId, update.status);
    }
    for (const update of updates) {
      this.store.assess(update.controlId, update.status, update.evidence, update.gaps, { source: "scanner" });
    }
    logger.debug(`Applied ${updates.length} scanner update(s)`);
    return {
      updates: [...updates],
      updatedControls: updates.map((u) => u.controlId),
    };
  }

  get(controlId: string): Assessment | undefined {
    return this.store.get(controlId);
  }

  assessments(): Assessment[] {
    return this.store.list();
  }

  history(controlId: string): readonly Assessment[] {
    return this.store.history(controlId);
  }

  domainScore(domain: string): Score {
    return this.scoring.domainScore(domain, this.store.list());
  }

  overallScore(): Score {
    return this.scoring.overallScore(this.store.list());
  }

  summary(): ScoreSummary {
    return this.scoring.summarize(this.store.list());
  }

  findings(): Finding[] {
    return this.findingGenerator.generate(this.store.list());
  }

  buildReport(warnings: readonly ScanWarning[] = []): AuditReport {
    const assessments = this.store.list();
    return {
      scope: this.currentScope,
      generatedAt: this.now().toISOString(),
      scores: {
        overall: this.scoring.overallScore(assessments),
        byDomain: this.scoring.allDomainScores(assessments),
      },
      summary: this.scoring.summarize(assessments),
      assessments,
      findings: this.findingGenerator.generate(assessments),
      warnings: [...warnings],
    };
  }
}
