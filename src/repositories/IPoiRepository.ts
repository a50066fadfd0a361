/**
 * Fingerprint store interface.
 * Read-only view over the POIs indexers have submitted.
 */

import type { DeploymentBlockKey, Fingerprint, FingerprintSet, Submission } from '../types/models.js';

export interface IPoiRepository {
  /** POIs currently on record for a key, with the indexers that submitted each. */
  currentSet(key: DeploymentBlockKey): Promise<FingerprintSet>;

  /** Every submission, on any key, whose POI is one of `fingerprints`. One round trip. */
  historicalOccurrences(fingerprints: readonly Fingerprint[]): Promise<Submission[]>;
}
