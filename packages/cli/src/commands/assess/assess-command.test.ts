import { ConfigStore, Store } from '@vulnrank/core';
import { AssessCommand, parseLimit } from './assess-command';
import { DependencyInjectionService } from '../../services/dependency-injection';

const mockConsoleLog = jest.spyOn(console, 'log').mockImplementation();
const mockConsoleError = jest.spyOn(console, 'error').mockImplementation();
const mockProcessExit = jest.spyOn(process, 'exit').mockImplementation();

const NOW = new Date('2024-06-01T00:00:00.000Z');

async function seed(stores: Store.Stores): Promise<void> {
  await stores.assets.put('pay-01', {
    id: 'pay-01',
    type: 'payment gateway',
    ipAddresses: ['203.0.113.10'],
    businessFunctions: ['checkout'],
  });
  await stores.vulnerabilities.put('CVE-2024-0001', {
    id: 'CVE-2024-0001',
    title: 'Gateway RCE',
    severity: 'critical',
    baseScore: 8,
    assetId: 'pay-01',
  });
  await stores.vulnerabilities.put('CVE-2024-0002', {
    id: 'CVE-2024-0002',
    title: 'Info leak',
    severity: 'low',
    baseScore: 3,
  });
}

describe('AssessCommand', () => {
  let stores: Store.Stores;
  let assessCommand: AssessCommand;

  beforeEach(async () => {
    stores = Store.createMemoryStores();
    await seed(stores);
    DependencyInjectionService.setInstance(
      new DependencyInjectionService({
        configStore: new ConfigStore.MemoryConfigStore(),
        stores,
        clock: () => NOW,
      })
    );
    assessCommand = new AssessCommand();
  });

  afterEach(() => {
    DependencyInjectionService.setInstance(null);
  });

  it('should rank stored vulnerabilities and save the assessments', async () => {
    await assessCommand.execute({});

    expect(mockConsoleLog.mock.calls.map((call) => call[0])).toEqual([
      '✅ Assessed 2 vulnerabilities',
      '   Critical: 1  High: 0  Medium: 0  Low: 1',
      '   Average risk score: 6.50',
      '   1. CVE-2024-0001  10.00 CRITICAL  pay-01',
      '   2. CVE-2024-0002  3.00 LOW  -',
    ]);
    expect((await stores.assessments.list()).sort()).toEqual(['CVE-2024-0001', 'CVE-2024-0002']);
  });

  it('should leave the store untouched with --no-persist', async () => {
    await assessCommand.execute({ persist: false });

    expect(mockConsoleLog).toHaveBeenCalledWith('✅ Assessed 2 vulnerabilities (not saved)');
    expect(await stores.assessments.list()).toEqual([]);
  });

  it('should limit the printed rows', async () => {
    await assessCommand.execute({ limit: '1', json: true });

    const output = JSON.parse(String(mockConsoleLog.mock.calls[0]?.[0]));
    expect(output.data.summary.total).toBe(2);
    expect(output.data.assessments).toHaveLength(1);
    expect(output.data.assessments[0].vulnerabilityId).toBe('CVE-2024-0001');
  });

  it('should reject a non-positive limit', async () => {
    await assessCommand.execute({ limit: '0' });

    expect(mockConsoleError).toHaveBeenCalledWith('❌ Failed to assess: Invalid limit: "0" must be a positive integer');
    expect(mockProcessExit).toHaveBeenCalledWith(1);
  });
});

describe('parseLimit', () => {
  it('should default to 20', () => {
    expect(parseLimit(undefined)).toBe(20);
  });

  it('should reject fractions', () => {
    expect(() => parseLimit('2.5')).toThrow('Invalid limit: "2.5" must be a positive integer');
  });
});
