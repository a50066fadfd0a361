import { describe, it, expect } from 'vitest';
import {
  buildFingerprintSet,
  dedupeKeys,
  disagreementIdentity,
  keyId,
  normalizeHex,
  sameIdentity,
} from '../../src/services/fingerprints.js';
import { StorageError } from '../../src/errors.js';

describe('normalizeHex', () => {
  it('should strip a postgres bytea prefix and lowercase', () => {
    expect(normalizeHex('\\xABcd01')).toBe('abcd01');
  });

  it('should strip a 0x prefix', () => {
    expect(normalizeHex('0xFF00')).toBe('ff00');
  });

  it('should reject non-hex input', () => {
    expect(() => normalizeHex('h1')).toThrow(StorageError);
  });

  it('should reject an odd number of hex digits', () => {
    expect(() => normalizeHex('abc')).toThrow('Malformed hex value');
  });
});

describe('buildFingerprintSet', () => {
  it('should group indexers by POI and drop duplicate rows', () => {
    const set = buildFingerprintSet([
      { poi: 'aaaa', indexerAddress: '1111' },
      { poi: 'AAAA', indexerAddress: '2222' },
      { poi: 'bbbb', indexerAddress: '3333' },
      { poi: 'aaaa', indexerAddress: '1111' },
    ]);

    expect([...set.keys()]).toEqual(['aaaa', 'bbbb']);
    expect([...(set.get('aaaa') ?? [])]).toEqual(['1111', '2222']);
    expect([...(set.get('bbbb') ?? [])]).toEqual(['3333']);
  });

  it('should return an empty set for no rows', () => {
    expect(buildFingerprintSet([]).size).toBe(0);
  });
});

describe('disagreementIdentity', () => {
  it('should sort and de-duplicate POIs', () => {
    expect(disagreementIdentity(['cccc', 'aaaa', 'CCCC', 'bbbb'])).toEqual(['aaaa', 'bbbb', 'cccc']);
  });

  it('should not depend on row order', () => {
    const rows = [
      { poi: 'bbbb', indexerAddress: '3333' },
      { poi: 'aaaa', indexerAddress: '1111' },
      { poi: 'aaaa', indexerAddress: '2222' },
    ];
    const forward = disagreementIdentity(buildFingerprintSet(rows));
    const reversed = disagreementIdentity(buildFingerprintSet([...rows].reverse()));

    expect(forward).toEqual(['aaaa', 'bbbb']);
    expect(reversed).toEqual(forward);
  });

  it('should order by bytes, not by string length', () => {
    expect(disagreementIdentity(['ff', '00ff', '0a'])).toEqual(['00ff', '0a', 'ff']);
  });

  it('should be empty for an empty set', () => {
    expect(disagreementIdentity(new Map())).toEqual([]);
  });
});

describe('sameIdentity', () => {
  it('should compare as sets', () => {
    expect(sameIdentity(['bbbb', 'aaaa'], ['aaaa', 'bbbb'])).toBe(true);
  });

  it('should detect a changed POI set', () => {
    expect(sameIdentity(['aaaa', 'bbbb'], ['aaaa', 'bbbb', 'cccc'])).toBe(false);
    expect(sameIdentity(['aaaa', 'bbbb'], ['aaaa', 'cccc'])).toBe(false);
  });
});

describe('dedupeKeys', () => {
  it('should keep the first occurrence of each key', () => {
    const keys = dedupeKeys([
      { deploymentId: 'QmABC', blockNumber: 100 },
      { deploymentId: 'QmDEF', blockNumber: 100 },
      { deploymentId: 'QmABC', blockNumber: 100 },
      { deploymentId: 'QmABC', blockNumber: 101 },
    ]);

    expect(keys.map(keyId)).toEqual(['QmABC@100', 'QmDEF@100', 'QmABC@101']);
  });
});
