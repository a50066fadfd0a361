/**
 * Discrepancy detector.
 * Decides whether the POIs on record for a key disagree, and whether that exact
 * disagreement has already been announced. Read-only.
 */

import type { IPoiRepository } from '../repositories/IPoiRepository.js';
import type { INotificationRepository } from '../repositories/INotificationRepository.js';
import type { DeploymentBlockKey, DetectionResult } from '../types/models.js';
import { disagreementIdentity } from './fingerprints.js';

export class DiscrepancyDetector {
  constructor(
    private readonly poiRepo: IPoiRepository,
    private readonly notificationRepo: INotificationRepository
  ) {}

  async detect(key: DeploymentBlockKey): Promise<DetectionResult> {
    const submissions = await this.poiRepo.currentSet(key);
    const identity = disagreementIdentity(submissions);

    // Ledger gate runs first so an announced state never costs a reuse lookup
    if (await this.notificationRepo.hasNotified(key, identity)) {
      return { kind: 'already-notified', identity };
    }

    if (identity.length === 0) {
      return { kind: 'no-disagreement', reason: 'no-submissions' };
    }
    if (identity.length === 1) {
      return { kind: 'no-disagreement', reason: 'consensus' };
    }

    return { kind: 'disagreement', identity, submissions };
  }
}
