/**
 * Source of candidate (deployment, block) keys for one monitoring cycle.
 */

import type { DeploymentBlockKey } from '../types/models.js';

export interface IDiscoverySource {
  /** Keys worth checking this cycle. Throws DiscoveryError when the source is unreachable. */
  listCandidateKeys(signal?: AbortSignal): Promise<DeploymentBlockKey[]>;
}
