// Mock DependencyInjectionService
jest.mock('../../services/dependency-injection', () => ({
  DependencyInjectionService: {
    getInstance: jest.fn()
  }
}));

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { AuditSession, Catalog, Config, Scanner } from '@secposture/core';
import type { Session } from '@secposture/core';
import { MockFileLister } from '@secposture/core/memory';
import { ScanCommand, logLevelFor, withName } from './scan-command';
import { DependencyInjectionService } from '../../services/dependency-injection';

// Mock console methods
const mockConsoleLog = jest.spyOn(console, 'log').mockImplementation();
const mockConsoleError = jest.spyOn(console, 'error').mockImplementation();
const mockProcessExit = jest.spyOn(process, 'exit').mockImplementation();

const mockDI = jest.mocked(DependencyInjectionService);

const FIXED_NOW = new Date('2026-03-01T12:00:00.000Z');

const catalog = Catalog.ControlCatalog.fromRecords([
  {
    id: 'CR-02', domain: 'Cryptography', name: 'Secret and Key Management', description: 'd',
    risk_class: 'critical', implementation_guidance: 'Use a secret manager. Rotate keys.', frameworks: {},
  },
  { id: 'CR-04', domain: 'Cryptography', name: 'Approved Algorithms', description: 'd', frameworks: {} },
  { id: 'DM-10', domain: 'Data Management', name: 'Encryption in Transit', description: 'd', frameworks: {} },
  { id: 'DM-11', domain: 'Data Management', name: 'Input Validation', description: 'd', frameworks: {} },
  { id: 'IAM-01', domain: 'Identity and Access Management', name: 'Access Policy', description: 'd', frameworks: {} },
  { id: 'SM-01', domain: 'Systems Monitoring', name: 'Security Event Logging', description: 'd', frameworks: {} },
]);

function loggedLines(): unknown[] {
  return mockConsoleLog.mock.calls.map(call => call[0]);
}

describe('ScanCommand', () => {
  let lister: MockFileLister;
  let scanner: Scanner.PatternScanner;
  let container: {
    getConfig: jest.Mock;
    getCatalog: jest.Mock;
    getPatternScanner: jest.Mock;
    createAuditSession: jest.Mock;
    loadAssessmentFile: jest.Mock;
  };
  let scanCommand: ScanCommand;

  beforeEach(() => {
    jest.clearAllMocks();

    lister = new MockFileLister({
      files: { 'src/config.py': 'api_key = "sk_live_0000aaaa1111bbbb"\n' },
    });
    scanner = new Scanner.PatternScanner(catalog, { openTarget: async () => lister, now: () => 0 });

    container = {
      getConfig: jest.fn().mockResolvedValue({
        catalogPath: null,
        scan: Config.defaultScanSettings(),
        scope: null,
        source: 'defaults',
      }),
      getCatalog: jest.fn().mockResolvedValue(catalog),
      getPatternScanner: jest.fn().mockReturnValue(scanner),
      createAuditSession: jest.fn(
        (c: Catalog.ControlCatalog, options: Session.AuditSessionOptions) =>
          new AuditSession(c, { ...options, now: () => FIXED_NOW })
      ),
      loadAssessmentFile: jest.fn(),
    };
    mockDI.getInstance.mockReturnValue(container as unknown as DependencyInjectionService);

    scanCommand = new ScanCommand();
  });

  it('should print the posture summary and the secrets finding', async () => {
    await scanCommand.execute({ path: '/repo', output: 'text' });

    const lines = loggedLines();
    expect(lines[0]).toBe('Scanning /repo...');
    expect(lines).toContain('SECURITY POSTURE');
    expect(lines).toContain('Overall score:  0.0 (Critical)');
    expect(lines).toContain('  F-001 CRITICAL Secret and Key Management (CR-02)');
    expect(lines).toContain('        Use a secret manager.');
    expect(lines).toContain('Files:      1 scanned, 0 skipped');
    expect(lines).toContain('Duration:   0ms');
    expect(mockProcessExit).not.toHaveBeenCalled();
  });

  it('should print the report contract as JSON', async () => {
    await scanCommand.execute({ path: '/repo', output: 'json' });

    expect(mockConsoleLog).toHaveBeenCalledTimes(1);
    const report = JSON.parse(String(mockConsoleLog.mock.calls[0]?.[0]));
    expect(report.generatedAt).toBe('2026-03-01T12:00:00.000Z');
    expect(report.scores.overall).toEqual({ kind: 'scored', value: 0, scoredControls: 1, notApplicable: 0 });
    expect(report.findings).toHaveLength(1);
    expect(report.findings[0].affectedControls).toEqual(['CR-02']);
    expect(report.assessments[0].evidence).toBe('Pattern scanner matches: src/config.py:1');
    expect(container.getPatternScanner).toHaveBeenCalledWith(catalog, 'silent');
  });

  it('should merge exclusions and limits with configuration', async () => {
    const scanSpy = jest.spyOn(scanner, 'scan');

    await scanCommand.execute({
      path: '/repo',
      output: 'text',
      exclude: 'vendor/**, generated/**',
      maxFileSize: 2048,
    });

    const scanOptions = scanSpy.mock.calls[0]?.[0];
    expect(scanOptions?.exclusions).toEqual(expect.arrayContaining(['**/node_modules/**', 'vendor/**', 'generated/**']));
    expect(scanOptions?.maxFileSize).toBe(2048);
    expect(scanOptions?.perFileTimeoutMs).toBe(2000);
    expect(scanOptions?.concurrency).toBe(8);
  });

  it('should apply an assessment file and a system name before scoring', async () => {
    container.loadAssessmentFile.mockResolvedValue({
      assessments: [{ controlId: 'IAM-01', status: 'compliant' }],
    });

    await scanCommand.execute({ path: '/repo', output: 'text', assessments: 'answers.yaml', name: 'Payments' });

    const lines = loggedLines();
    expect(container.loadAssessmentFile).toHaveBeenCalledWith('answers.yaml');
    expect(lines).toContain('SECURITY POSTURE: Payments');
    expect(lines).toContain('Overall score:  50.0 (Poor)');
  });

  it('should only print critical findings in quiet mode', async () => {
    await scanCommand.execute({ path: '/repo', output: 'text', quiet: true });

    expect(loggedLines()).toEqual([
      '❌ 1 critical finding(s) detected',
      '   F-001 Secret and Key Management (CR-02)',
    ]);
  });

  it('should write the JSON report to --out', async () => {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'scan-command-test-'));
    const outFile = path.join(tempDir, 'report.json');
    try {
      await scanCommand.execute({ path: '/repo', output: 'text', out: outFile });

      const written = JSON.parse(fs.readFileSync(outFile, 'utf-8'));
      expect(written.findings[0].id).toBe('F-001');
      expect(loggedLines()).toContain(`✅ Report written to ${outFile}`);
    } finally {
      fs.rmSync(tempDir, { recursive: true, force: true });
    }
  });

  it('should exit 1 when the target cannot be scanned', async () => {
    container.getPatternScanner.mockReturnValue(
      new Scanner.PatternScanner(catalog, {
        openTarget: async (rootPath: string) => {
          throw new Scanner.ScanTargetError('path does not exist', rootPath);
        },
      })
    );

    await scanCommand.execute({ path: '/missing', output: 'text' });

    expect(mockConsoleError).toHaveBeenCalledWith('❌ Cannot scan /missing: path does not exist');
    expect(mockProcessExit).toHaveBeenCalledWith(1);
  });

  it('should report catalog failures as JSON in json mode', async () => {
    container.getCatalog.mockRejectedValue(new Error('Invalid control catalog x.json: catalog contains no controls'));

    await scanCommand.execute({ path: '/repo', output: 'json' });

    expect(JSON.parse(String(mockConsoleLog.mock.calls[0]?.[0]))).toEqual({
      success: false,
      error: 'Invalid control catalog x.json: catalog contains no controls',
      exitCode: 1,
    });
    expect(mockProcessExit).toHaveBeenCalledWith(1);
  });
});

describe('withName', () => {
  it('should create a minimal scope when none exists', () => {
    expect(withName(null, 'Billing')).toEqual({
      name: 'Billing',
      criticality: 'medium',
      dataClasses: [],
      frameworksRequired: [],
    });
  });

  it('should keep other scope fields', () => {
    const scope = { name: 'Old', criticality: 'high' as const, dataClasses: ['PII'], frameworksRequired: [] };
    expect(withName(scope, 'New')).toEqual({ ...scope, name: 'New' });
  });
});

describe('logLevelFor', () => {
  it('should map verbosity flags to logger levels', () => {
    expect(logLevelFor({ verbose: true, json: true })).toBe('debug');
    expect(logLevelFor({ json: true })).toBe('silent');
    expect(logLevelFor({ quiet: true })).toBe('silent');
    expect(logLevelFor({})).toBe('warn');
  });
});
