import { describe, it, expect, beforeEach } from 'vitest';
import { ReuseAnalyzer, elapsedDays } from '../../src/services/ReuseAnalyzer.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { StorageError } from '../../src/errors.js';
import { buildFingerprintSet } from '../../src/services/fingerprints.js';
import { MockPoiRepository } from '../mocks/MockPoiRepository.js';

const KEY = { deploymentId: 'QmABC', blockNumber: 100 };
const T1 = new Date('2026-02-28T00:00:00.000Z');
const T2 = new Date('2026-03-07T12:00:00.000Z');
const T3 = new Date('2026-03-10T00:00:00.000Z');

describe('ReuseAnalyzer', () => {
  let poiRepo: MockPoiRepository;
  let logger: ConsoleLogProvider;
  let analyzer: ReuseAnalyzer;

  beforeEach(() => {
    poiRepo = new MockPoiRepository();
    logger = new ConsoleLogProvider();
    analyzer = new ReuseAnalyzer(poiRepo, logger);
  });

  function currentSet() {
    return buildFingerprintSet([
      { poi: 'aaaa', indexerAddress: '3333' },
      { poi: 'bbbb', indexerAddress: '4444' },
    ]);
  }

  it('should report every earlier use relative to the most recent one', async () => {
    poiRepo.submit({ deploymentId: 'QmOLD', blockNumber: 50 }, 'aaaa', '1111', {
      submittedAt: T1,
      network: 'gnosis',
    });
    poiRepo.submit({ deploymentId: 'QmMID', blockNumber: 75 }, 'aaaa', '2222', {
      submittedAt: T2,
    });
    poiRepo.submit(KEY, 'aaaa', '3333', { submittedAt: T3 });
    poiRepo.submit(KEY, 'bbbb', '4444', { submittedAt: T3 });

    const reuse = await analyzer.analyzeReuse(currentSet());

    expect([...reuse.keys()]).toEqual(['aaaa']);
    expect(reuse.get('aaaa')).toEqual([
      'Previously used 2 days ago:\n• Network: mainnet\n• Deployment: QmMID\n• Block: 75\n• Indexer: 2222',
      'Previously used 10 days ago:\n• Network: gnosis\n• Deployment: QmOLD\n• Block: 50\n• Indexer: 1111',
    ]);
  });

  it('should not depend on the order the store returns occurrences in', async () => {
    poiRepo.submit(KEY, 'aaaa', '3333', { submittedAt: T3 });
    poiRepo.submit({ deploymentId: 'QmOLD', blockNumber: 50 }, 'aaaa', '1111', { submittedAt: T1 });
    poiRepo.submit({ deploymentId: 'QmMID', blockNumber: 75 }, 'aaaa', '2222', { submittedAt: T2 });

    const reuse = await analyzer.analyzeReuse(currentSet());
    const lines = reuse.get('aaaa') ?? [];

    expect(lines).toHaveLength(2);
    expect(lines[0]).toContain('Previously used 2 days ago:');
    expect(lines[1]).toContain('Previously used 10 days ago:');
  });

  it('should omit POIs seen only once', async () => {
    poiRepo.submit(KEY, 'aaaa', '3333', { submittedAt: T3 });
    poiRepo.submit(KEY, 'bbbb', '4444', { submittedAt: T3 });

    const reuse = await analyzer.analyzeReuse(currentSet());
    expect(reuse.size).toBe(0);
  });

  it('should look up all POIs in a single batched call', async () => {
    await analyzer.analyzeReuse(currentSet());

    expect(poiRepo.occurrenceCalls).toEqual([['aaaa', 'bbbb']]);
  });

  it('should report zero days for simultaneous submissions', async () => {
    poiRepo.submit(KEY, 'aaaa', '3333', { submittedAt: T3 });
    poiRepo.submit({ deploymentId: 'QmOTHER', blockNumber: 7 }, 'aaaa', '5555', { submittedAt: T3 });

    const reuse = await analyzer.analyzeReuse(currentSet());
    expect(reuse.get('aaaa')).toEqual([
      'Previously used 0 days ago:\n• Network: mainnet\n• Deployment: QmOTHER\n• Block: 7\n• Indexer: 5555',
    ]);
  });

  it('should return an empty map and warn when the lookup fails', async () => {
    poiRepo.occurrencesError = new StorageError('connection reset');

    const reuse = await analyzer.analyzeReuse(currentSet());

    expect(reuse.size).toBe(0);
    expect(logger.eventsAt('warn')).toHaveLength(1);
    expect(logger.eventsAt('warn')[0].fields).toMatchObject({
      poiCount: 2,
      error: 'connection reset',
      errorCode: 'STORAGE_ERROR',
    });
  });
});

describe('elapsedDays', () => {
  it('should count whole days', () => {
    expect(elapsedDays(T3, T2)).toBe(2);
    expect(elapsedDays(T3, T1)).toBe(10);
  });

  it('should never be negative', () => {
    expect(elapsedDays(T1, T3)).toBe(0);
  });
});
