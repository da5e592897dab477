import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { ControlCatalog, UnknownControlError } from "../control_catalog";
import { AssessmentStore, compareIds } from "./assessment_store";
import { AssessmentFileError, InvalidStatusError } from "./assessment_store.errors";
import {
  applyAssessmentEntries,
  loadAssessmentFile,
  parseAssessmentFile,
} from "./assessment_file";

const catalog = ControlCatalog.fromRecords([
  {
    id: "CR-02",
    domain: "Cryptography",
    name: "Secret and Key Management",
    description: "Keep secrets out of source code.",
    risk_class: "critical",
    frameworks: { "SOC 2": true },
  },
  {
    id: "CR-04",
    domain: "Cryptography",
    name: "Approved Algorithms",
    description: "Use approved algorithms.",
    frameworks: { "SOC 2": true },
  },
  {
    id: "AM-01",
    domain: "Asset Management",
    name: "Asset Inventory",
    description: "Keep an inventory.",
    frameworks: { "ISO 27001": true },
  },
]);

const fixedClock = () => new Date("2026-01-15T10:00:00.000Z");

describe("AssessmentStore", () => {
  let store: AssessmentStore;

  beforeEach(() => {
    store = new AssessmentStore(catalog, { now: fixedClock });
  });

  describe("assess", () => {
    it("should record an assessment with control metadata", () => {
      const record = store.assess("CR-02", "partial", "vault for prod only", ["Dev secrets in .env"]);

      expect(record).toEqual({
        controlId: "CR-02",
        domain: "Cryptography",
        controlName: "Secret and Key Management",
        status: "partial",
        evidence: "vault for prod only",
        gaps: ["Dev secrets in .env"],
        source: "manual",
        assessedAt: "2026-01-15T10:00:00.000Z",
      });
      expect(Object.isFrozen(record)).toBe(true);
    });

    it("should default evidence and gaps to empty", () => {
      const record = store.assess("AM-01", "compliant");
      expect(record.evidence).toBe("");
      expect(record.gaps).toEqual([]);
    });

    it("should keep notes and source when given", () => {
      const record = store.assess("CR-04", "non_compliant", "", [], {
        source: "scanner",
        notes: "md5 in legacy module",
      });
      expect(record.source).toBe("scanner");
      expect(record.notes).toBe("md5 in legacy module");
    });

    it("should reject an unknown control id and leave the store unchanged", () => {
      store.assess("CR-02", "compliant");

      expect(() => store.assess("XX-99", "compliant")).toThrow(UnknownControlError);
      expect(store.size).toBe(1);
      expect(store.has("XX-99")).toBe(false);
    });

    it("should reject an invalid status and leave the previous record in place", () => {
      store.assess("CR-02", "compliant");

      expect(() => store.assess("CR-02", "mostly_fine")).toThrow(InvalidStatusError);
      expect(() => store.assess("CR-02", "mostly_fine")).toThrow(
        'Invalid compliance status "mostly_fine" for CR-02. ' +
          "Expected one of: compliant, partial, non_compliant, not_applicable, not_assessed"
      );
      expect(store.get("CR-02")?.status).toBe("compliant");
      expect(store.history("CR-02")).toHaveLength(1);
    });

    it("should let the latest write win and keep the history", () => {
      store.assess("CR-02", "non_compliant", "", ["Key in repo"]);
      store.assess("CR-02", "compliant", "rotated and moved to vault");

      expect(store.get("CR-02")?.status).toBe("compliant");
      expect(store.size).toBe(1);
      expect(store.history("CR-02").map((a) => a.status)).toEqual(["non_compliant", "compliant"]);
    });

    it("should not expose the gaps array passed in", () => {
      const gaps = ["First gap"];
      const record = store.assess("CR-02", "partial", "", gaps);
      gaps.push("Second gap");
      expect(record.gaps).toEqual(["First gap"]);
    });
  });

  describe("list", () => {
    it("should return assessments sorted by control id", () => {
      store.assess("CR-04", "compliant");
      store.assess("AM-01", "partial", "", ["No owner"]);
      store.assess("CR-02", "compliant");

      expect(store.list().map((a) => a.controlId)).toEqual(["AM-01", "CR-02", "CR-04"]);
    });
  });

  describe("history", () => {
    it("should return an empty list for a control never assessed", () => {
      expect(store.history("CR-02")).toEqual([]);
    });
  });
});

describe("compareIds", () => {
  it("should order by code units", () => {
    expect(["b", "B", "a", "A"].sort(compareIds)).toEqual(["A", "B", "a", "b"]);
    expect(compareIds("CR-02", "CR-02")).toBe(0);
  });
});

describe("assessment files", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "secposture-assessments-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("should load a JSON assessment file with scope", async () => {
    const filePath = path.join(tempDir, "assessments.json");
    fs.writeFileSync(
      filePath,
      JSON.stringify({
        scope: {
          name: "Payments API",
          criticality: "high",
          dataClasses: ["Payment Data"],
          frameworksRequired: ["PCI DSS"],
        },
        assessments: [{ controlId: "CR-02", status: "compliant" }],
      })
    );

    const file = await loadAssessmentFile(filePath);

    expect(file.scope?.name).toBe("Payments API");
    expect(file.assessments).toEqual([{ controlId: "CR-02", status: "compliant" }]);
  });

  it("should load a YAML assessment file", async () => {
    const filePath = path.join(tempDir, "assessments.yaml");
    fs.writeFileSync(
      filePath,
      [
        "assessments:",
        "  - controlId: CR-04",
        "    status: partial",
        "    gaps:",
        "      - SHA-1 still used for signatures",
      ].join("\n")
    );

    const file = await loadAssessmentFile(filePath);

    expect(file.assessments[0]?.gaps).toEqual(["SHA-1 still used for signatures"]);
  });

  it("should reject a missing file", async () => {
    await expect(loadAssessmentFile(path.join(tempDir, "missing.json"))).rejects.toThrow(
      AssessmentFileError
    );
  });

  it("should reject unparsable content", () => {
    expect(() => parseAssessmentFile("{ not json", "broken.json")).toThrow(
      /^Invalid assessment file broken\.json: could not be parsed/
    );
  });

  it("should reject an entry with non-string gaps and name the field", () => {
    const content = JSON.stringify({
      assessments: [{ controlId: "CR-02", status: "partial", gaps: [42] }],
    });

    expect(() => parseAssessmentFile(content, "a.json")).toThrow(
      "Invalid assessment file a.json: field /assessments/0/gaps/0 must be string"
    );
  });

  it("should reject a file without an assessments list", () => {
    expect(() => parseAssessmentFile("{}", "a.json")).toThrow(
      "Invalid assessment file a.json: field /assessments must have required property 'assessments'"
    );
  });

  describe("applyAssessmentEntries", () => {
    it("should apply every entry as a manual assessment", () => {
      const store = new AssessmentStore(catalog, { now: fixedClock });

      const applied = applyAssessmentEntries(store, [
        { controlId: "CR-02", status: "compliant", evidence: "vault" },
        { controlId: "AM-01", status: "partial", gaps: ["No owner"], notes: "interview" },
      ]);

      expect(applied).toHaveLength(2);
      expect(store.get("AM-01")?.notes).toBe("interview");
      expect(store.get("CR-02")?.source).toBe("manual");
    });

    it("should apply nothing when one entry has an unknown control", () => {
      const store = new AssessmentStore(catalog);

      expect(() =>
        applyAssessmentEntries(store, [
          { controlId: "CR-02", status: "compliant" },
          { controlId: "ZZ-01", status: "compliant" },
        ])
      ).toThrow(UnknownControlError);
      expect(store.size).toBe(0);
    });

    it("should apply nothing when one entry has an invalid status", () => {
      const store = new AssessmentStore(catalog);

      expect(() =>
        applyAssessmentEntries(store, [
          { controlId: "CR-02", status: "compliant" },
          { controlId: "CR-04", status: "done" },
        ])
      ).toThrow(InvalidStatusError);
      expect(store.size).toBe(0);
    });
  });
});
