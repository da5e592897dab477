import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { ControlCatalog, loadControlCatalog, resolveBundledCatalogPath } from "../control_catalog";
import { MockFileLister } from "../file_lister";
import { aggregateMatches } from "./match_aggregator";
import { PatternScanner, looksBinary } from "./pattern_scanner";
import {
  DetectorConfigurationError,
  ScanCancelledError,
  ScanTargetError,
} from "./pattern_scanner.errors";
import type { DetectorDescriptor } from "./pattern_scanner.types";

const SECRET_LINE = 'api_key = "sk_live_0000aaaa1111bbbb"';

async function bundledCatalog(): Promise<ControlCatalog> {
  const catalogPath = resolveBundledCatalogPath();
  if (!catalogPath) {
    throw new Error("bundled catalog not found");
  }
  return loadControlCatalog(catalogPath);
}

function scannerFor(catalog: ControlCatalog, lister: MockFileLister, detectors?: DetectorDescriptor[]) {
  return new PatternScanner(catalog, {
    openTarget: async () => lister,
    ...(detectors ? { detectors } : {}),
  });
}

describe("PatternScanner", () => {
  let catalog: ControlCatalog;

  beforeAll(async () => {
    catalog = await bundledCatalog();
  });

  describe("constructor", () => {
    it("should reject detectors mapped to controls missing from the catalog", () => {
      const small = ControlCatalog.fromRecords([
        { id: "CR-02", domain: "Cryptography", name: "Secrets", description: "d", frameworks: {} },
      ]);

      expect(() => new PatternScanner(small)).toThrow(DetectorConfigurationError);
      expect(() => new PatternScanner(small)).toThrow("Detector CRY-001 maps to unknown control CR-04");
    });
  });

  describe("scan", () => {
    it("should report exactly one definite secrets match for a hardcoded key", async () => {
      const lister = new MockFileLister({ files: { "src/config.py": `${SECRET_LINE}\n` } });

      const result = await scannerFor(catalog, lister).scan({ rootPath: "/repo" });

      expect(result.matches).toEqual([
        {
          detectorId: "SEC-001",
          category: "hardcoded-secret",
          severity: "critical",
          controlId: "CR-02",
          file: "src/config.py",
          line: 1,
          snippet: 'api_key = "sk_l****"',
          confidence: "definite",
        },
      ]);
      expect(aggregateMatches(result.matches)).toEqual([
        {
          controlId: "CR-02",
          status: "non_compliant",
          evidence: "Pattern scanner matches: src/config.py:1",
          gaps: ["Hardcoded secret or credential in source code (1 occurrence)"],
          matchCount: 1,
        },
      ]);
      expect(result.scannedFiles).toBe(1);
      expect(result.warnings).toEqual([]);
    });

    it("should skip default exclusions", async () => {
      const lister = new MockFileLister({
        files: {
          "node_modules/pkg/config.js": SECRET_LINE,
          "vendor/lib/config.php": SECRET_LINE,
          ".git/config": SECRET_LINE,
          "src/app.ts": "export const x = 1;",
        },
      });

      const result = await scannerFor(catalog, lister).scan({ rootPath: "/repo" });

      expect(result.matches).toEqual([]);
      expect(result.scannedFiles).toBe(1);
    });

    it("should use custom exclusions instead of the defaults", async () => {
      const lister = new MockFileLister({
        files: { "generated/config.py": SECRET_LINE, "node_modules/a.js": SECRET_LINE },
      });

      const result = await scannerFor(catalog, lister).scan({
        rootPath: "/repo",
        exclusions: ["generated/**"],
      });

      expect(result.matches.map((m) => m.file)).toEqual(["node_modules/a.js"]);
    });

    it("should sort matches by file, line and detector id", async () => {
      const lister = new MockFileLister({
        files: {
          "src/b.js": ['const h = md5(x);', SECRET_LINE].join("\n"),
          "src/a.js": ['db.query("SELECT * FROM t WHERE id = " + id);'].join("\n"),
        },
      });

      const result = await scannerFor(catalog, lister).scan({ rootPath: "/repo" });

      expect(result.matches.map((m) => [m.file, m.line, m.detectorId])).toEqual([
        ["src/a.js", 1, "INJ-001"],
        ["src/b.js", 1, "CRY-002"],
        ["src/b.js", 2, "SEC-001"],
      ]);
    });

    it("should warn about binary, oversized and unreadable files and keep scanning", async () => {
      const lister = new MockFileLister({
        files: {
          "assets/logo.png": Buffer.from([0x89, 0x50, 0x00, 0x47]),
          "logs/huge.log": SECRET_LINE,
          "secrets/locked.env": SECRET_LINE,
          "src/config.py": SECRET_LINE,
        },
        stats: new Map([["logs/huge.log", { size: 5_000_000, mtime: 0, isFile: true }]]),
        unreadable: ["secrets/locked.env"],
      });

      const result = await scannerFor(catalog, lister).scan({ rootPath: "/repo", maxFileSize: 1024 });

      expect(result.warnings.map((w) => [w.file, w.kind])).toEqual([
        ["assets/logo.png", "binary"],
        ["logs/huge.log", "too_large"],
        ["secrets/locked.env", "unreadable"],
      ]);
      expect(result.warnings[1]?.message).toBe("File is 5000000 bytes, limit is 1024");
      expect(result.matches.map((m) => m.file)).toEqual(["src/config.py"]);
      expect(result.scannedFiles).toBe(1);
      expect(result.skippedFiles).toBe(3);
    });

    it("should drop every match of a file that exceeds its time budget", async () => {
      let clock = 0;
      const slow: DetectorDescriptor = {
        kind: "pattern",
        id: "SLOW-001",
        pattern: /SLOW/,
        category: "injection-risk",
        severity: "low",
        controlId: "DM-11",
        confidence: "definite",
        message: "slow marker",
        suppress: () => {
          clock += 10_000;
          return false;
        },
      };
      const lister = new MockFileLister({
        files: { "a.txt": "SLOW\nSLOW\nSLOW", "b.txt": "nothing here" },
      });
      const scanner = new PatternScanner(catalog, {
        detectors: [slow],
        openTarget: async () => lister,
        now: () => clock,
      });

      const result = await scanner.scan({ rootPath: "/repo", perFileTimeoutMs: 50 });

      expect(result.matches).toEqual([]);
      expect(result.warnings).toEqual([
        { file: "a.txt", kind: "timeout", message: "Evaluation exceeded 50ms" },
      ]);
      expect(result.scannedFiles).toBe(1);
    });

    it("should skip a file with an over-long line as too large", async () => {
      const lister = new MockFileLister({
        files: {
          "public/app.min.js": 'db.query("' + "SELECT a ".repeat(60000),
          "src/config.py": SECRET_LINE,
        },
      });

      const result = await scannerFor(catalog, lister).scan({ rootPath: "/repo" });

      expect(result.warnings).toEqual([
        { file: "public/app.min.js", kind: "too_large", message: "Line 1 is 540010 characters, limit is 4096" },
      ]);
      expect(result.matches.map((m) => m.file)).toEqual(["src/config.py"]);
      expect(result.scannedFiles).toBe(1);
      expect(result.skippedFiles).toBe(1);
    });

    it("should yield identical results for an unchanged tree", async () => {
      const lister = new MockFileLister({
        files: {
          "src/config.py": SECRET_LINE,
          "src/server.js": "server.listen(80);",
          "src/hash.py": "h = hashlib.md5(data)",
        },
      });
      const scanner = scannerFor(catalog, lister);

      const first = await scanner.scan({ rootPath: "/repo" });
      const second = await scanner.scan({ rootPath: "/repo" });

      expect(second.matches).toEqual(first.matches);
      expect(aggregateMatches(second.matches)).toEqual(aggregateMatches(first.matches));
    });

    it("should not modify the scanned tree", async () => {
      const lister = new MockFileLister({ files: { "src/config.py": SECRET_LINE } });

      await scannerFor(catalog, lister).scan({ rootPath: "/repo" });

      expect(await lister.read("src/config.py")).toBe(SECRET_LINE);
      expect(lister.size()).toBe(1);
    });

    describe("cancellation", () => {
      it("should throw before scanning when the signal is already aborted", async () => {
        const controller = new AbortController();
        controller.abort();
        const lister = new MockFileLister({ files: { "src/config.py": SECRET_LINE } });

        await expect(
          scannerFor(catalog, lister).scan({ rootPath: "/repo", signal: controller.signal })
        ).rejects.toThrow(ScanCancelledError);
      });

      it("should stop between files once aborted", async () => {
        const controller = new AbortController();
        const aborting: DetectorDescriptor = {
          kind: "pattern",
          id: "ABORT-001",
          pattern: /STOP/,
          category: "injection-risk",
          severity: "low",
          controlId: "DM-11",
          confidence: "heuristic",
          message: "abort marker",
          suppress: () => {
            controller.abort();
            return false;
          },
        };
        const lister = new MockFileLister({
          files: { "a.txt": "STOP", "b.txt": "STOP", "c.txt": "STOP" },
        });

        await expect(
          scannerFor(catalog, lister, [aborting]).scan({
            rootPath: "/repo",
            concurrency: 1,
            signal: controller.signal,
          })
        ).rejects.toThrow("Scan cancelled after 1 files");
      });

      it("should not evaluate further files of the same batch once aborted", async () => {
        const controller = new AbortController();
        const evaluated: string[] = [];
        const aborting: DetectorDescriptor = {
          kind: "pattern",
          id: "ABORT-001",
          pattern: /STOP/,
          category: "injection-risk",
          severity: "low",
          controlId: "DM-11",
          confidence: "heuristic",
          message: "abort marker",
          suppress: ({ file }) => {
            evaluated.push(file);
            controller.abort();
            return false;
          },
        };
        const lister = new MockFileLister({
          files: { "a.txt": "STOP", "b.txt": "STOP", "c.txt": "STOP" },
        });

        await expect(
          scannerFor(catalog, lister, [aborting]).scan({
            rootPath: "/repo",
            concurrency: 8,
            signal: controller.signal,
          })
        ).rejects.toThrow("Scan cancelled after 1 files");
        expect(evaluated).toHaveLength(1);
      });
    });
  });

  describe("filesystem target", () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "pattern-scanner-test-"));
    });

    afterEach(async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    });

    it("should scan files on disk", async () => {
      await fs.mkdir(path.join(tempDir, "src"), { recursive: true });
      await fs.writeFile(path.join(tempDir, "src", "config.py"), SECRET_LINE);
      await fs.mkdir(path.join(tempDir, "node_modules", "pkg"), { recursive: true });
      await fs.writeFile(path.join(tempDir, "node_modules", "pkg", "index.js"), SECRET_LINE);

      const result = await new PatternScanner(catalog).scan({ rootPath: tempDir });

      expect(result.matches.map((m) => [m.file, m.detectorId])).toEqual([["src/config.py", "SEC-001"]]);
    });

    it("should fail with ScanTargetError for a missing root", async () => {
      await expect(
        new PatternScanner(catalog).scan({ rootPath: path.join(tempDir, "missing") })
      ).rejects.toThrow(ScanTargetError);
    });

    it("should fail with ScanTargetError when the root is a file", async () => {
      const filePath = path.join(tempDir, "file.txt");
      await fs.writeFile(filePath, "x");

      await expect(new PatternScanner(catalog).scan({ rootPath: filePath })).rejects.toThrow(
        `Cannot scan ${filePath}: not a directory`
      );
    });
  });
});

describe("looksBinary", () => {
  it("should detect a NUL byte within the sniff window only", () => {
    expect(looksBinary(Buffer.from("plain text"))).toBe(false);
    expect(looksBinary(Buffer.from([0x41, 0x00, 0x42]))).toBe(true);
    expect(looksBinary(Buffer.concat([Buffer.alloc(8000, 0x41), Buffer.from([0x00])]))).toBe(false);
  });
});
