/**
 * Fingerprint normalization and disagreement identity.
 *
 * POIs and indexer addresses are bytes in the store. They travel through the
 * monitor as lowercase hex so that string order equals byte-lexicographic order,
 * which is what makes the identity canonical.
 */

import { StorageError } from '../errors.js';
import type {
  DeploymentBlockKey,
  DisagreementIdentity,
  Fingerprint,
  FingerprintSet,
} from '../types/models.js';

const HEX_PREFIX = /^(\\x|0x)/i;
const HEX_BODY = /^[0-9a-f]*$/;

/** Lowercase hex without `\x` / `0x` prefix. Throws on anything that is not hex. */
export function normalizeHex(value: string): string {
  const body = value.trim().replace(HEX_PREFIX, '').toLowerCase();
  if (!HEX_BODY.test(body) || body.length % 2 !== 0) {
    throw new StorageError(`Malformed hex value: "${value}"`, { code: 'MALFORMED_ROW' });
  }
  return body;
}

/** Fold (poi, indexer) rows into a FingerprintSet. Row order and duplicates don't matter. */
export function buildFingerprintSet(
  rows: Iterable<{ poi: string; indexerAddress: string }>
): FingerprintSet {
  const set: FingerprintSet = new Map();
  for (const row of rows) {
    const poi = normalizeHex(row.poi);
    const indexer = normalizeHex(row.indexerAddress);
    const indexers = set.get(poi);
    if (indexers) {
      indexers.add(indexer);
    } else {
      set.set(poi, new Set([indexer]));
    }
  }
  return set;
}

export function compareFingerprints(a: Fingerprint, b: Fingerprint): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** Sorted distinct fingerprints. Accepts a FingerprintSet or any list of POIs. */
export function disagreementIdentity(
  source: FingerprintSet | Iterable<Fingerprint>
): DisagreementIdentity {
  const pois = source instanceof Map ? source.keys() : source;
  const distinct = new Set<Fingerprint>();
  for (const poi of pois) distinct.add(normalizeHex(poi));
  return [...distinct].sort(compareFingerprints);
}

/** Value equality of two identities, regardless of how either was ordered. */
export function sameIdentity(a: DisagreementIdentity, b: DisagreementIdentity): boolean {
  const left = disagreementIdentity(a);
  const right = disagreementIdentity(b);
  return left.length === right.length && left.every((poi, i) => poi === right[i]);
}

export function keyId(key: DeploymentBlockKey): string {
  return `${key.deploymentId}@${key.blockNumber}`;
}

export function keyFields(key: DeploymentBlockKey): Record<string, unknown> {
  return { deploymentId: key.deploymentId, blockNumber: key.blockNumber };
}

/** Drop repeated keys, keeping first-seen order. */
export function dedupeKeys(keys: Iterable<DeploymentBlockKey>): DeploymentBlockKey[] {
  const seen = new Set<string>();
  const result: DeploymentBlockKey[] = [];
  for (const key of keys) {
    const id = keyId(key);
    if (seen.has(id)) continue;
    seen.add(id);
    result.push(key);
  }
  return result;
}
