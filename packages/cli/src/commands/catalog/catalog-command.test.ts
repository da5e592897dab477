// Mock DependencyInjectionService
jest.mock('../../services/dependency-injection', () => ({
  DependencyInjectionService: {
    getInstance: jest.fn()
  }
}));

import { Catalog } from '@secposture/core';
import { CatalogCommand } from './catalog-command';
import { DependencyInjectionService } from '../../services/dependency-injection';

const mockConsoleLog = jest.spyOn(console, 'log').mockImplementation();
const mockConsoleError = jest.spyOn(console, 'error').mockImplementation();
const mockProcessExit = jest.spyOn(process, 'exit').mockImplementation();

const mockDI = jest.mocked(DependencyInjectionService);

const catalog = Catalog.ControlCatalog.fromRecords([
  { id: 'CR-01', domain: 'Cryptography', name: 'Cryptographic Policy', description: 'd', frameworks: { 'SOC 2': true } },
  { id: 'CR-02', domain: 'Cryptography', name: 'Secret and Key Management', description: 'd', risk_class: 'critical', frameworks: { 'SOC 2': true } },
  { id: 'BC-01', domain: 'Business Continuity', name: 'Backups', description: 'd', frameworks: { 'SOC 2': false } },
]);

describe('CatalogCommand', () => {
  let catalogCommand: CatalogCommand;

  beforeEach(() => {
    jest.clearAllMocks();
    mockDI.getInstance.mockReturnValue({
      getCatalog: jest.fn().mockResolvedValue(catalog),
    } as unknown as DependencyInjectionService);
    catalogCommand = new CatalogCommand();
  });

  it('should list domains with control counts', async () => {
    await catalogCommand.execute({ output: 'text' });

    expect(mockConsoleLog.mock.calls.map(call => call[0])).toEqual([
      '3 controls in 2 domains',
      `  ${'Business Continuity'.padEnd(36)}   1`,
      `  ${'Cryptography'.padEnd(36)}   2`,
    ]);
  });

  it('should list the controls of one domain', async () => {
    await catalogCommand.execute({ output: 'text', domain: 'Cryptography' });

    expect(mockConsoleLog.mock.calls.map(call => call[0])).toEqual([
      'Cryptography (2 controls)',
      '  CR-01    standard  Cryptographic Policy',
      '  CR-02    critical  Secret and Key Management',
    ]);
  });

  it('should print statistics as JSON', async () => {
    await catalogCommand.execute({ output: 'json' });

    const output = JSON.parse(String(mockConsoleLog.mock.calls[0]?.[0]));
    expect(output.success).toBe(true);
    expect(output.data.controlsPerDomain).toEqual({ 'Business Continuity': 1, Cryptography: 2 });
    expect(output.data.frameworkCoverage).toEqual({ 'SOC 2': 2 });
  });

  it('should exit 1 for an unknown domain', async () => {
    await catalogCommand.execute({ output: 'text', domain: 'Physical Security' });

    expect(mockConsoleError).toHaveBeenCalledWith(
      '❌ Unknown domain: Physical Security. Known domains: Business Continuity, Cryptography'
    );
    expect(mockProcessExit).toHaveBeenCalledWith(1);
  });
});
