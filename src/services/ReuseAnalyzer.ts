/**
 * POI reuse analyzer.
 * Looks up every earlier submission of the disagreeing POIs across all
 * deployments and blocks. The same POI showing up elsewhere suggests a copied
 * or stale attestation.
 */

import type { IPoiRepository } from '../repositories/IPoiRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { Fingerprint, FingerprintSet, ReuseMap, Submission } from '../types/models.js';
import { errorFields } from '../errors.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/** Whole days from `earlier` to `later`, never negative. */
export function elapsedDays(later: Date, earlier: Date): number {
  return Math.max(0, Math.floor((later.getTime() - earlier.getTime()) / DAY_MS));
}

export function formatProvenance(current: Submission, previous: Submission): string {
  return [
    `Previously used ${elapsedDays(current.submittedAt, previous.submittedAt)} days ago:`,
    `• Network: ${previous.network}`,
    `• Deployment: ${previous.key.deploymentId}`,
    `• Block: ${previous.key.blockNumber}`,
    `• Indexer: ${previous.indexerAddress}`,
  ].join('\n');
}

export class ReuseAnalyzer {
  constructor(
    private readonly poiRepo: IPoiRepository,
    private readonly logger: ILogProvider
  ) {}

  /** Best effort: a failed lookup yields an empty map. */
  async analyzeReuse(submissions: FingerprintSet): Promise<ReuseMap> {
    const pois = [...submissions.keys()];
    let occurrences: Submission[];
    try {
      occurrences = await this.poiRepo.historicalOccurrences(pois);
    } catch (err) {
      this.logger.warn('POI reuse lookup failed, reporting without reuse info', {
        poiCount: pois.length,
        ...errorFields(err),
      });
      return new Map();
    }

    const byPoi = new Map<Fingerprint, Submission[]>();
    for (const occurrence of occurrences) {
      if (!submissions.has(occurrence.fingerprint)) continue;
      const list = byPoi.get(occurrence.fingerprint);
      if (list) list.push(occurrence);
      else byPoi.set(occurrence.fingerprint, [occurrence]);
    }

    const reuse: ReuseMap = new Map();
    for (const [poi, list] of byPoi) {
      if (list.length < 2) continue;
      // Array.prototype.sort is stable, so equal timestamps keep store order
      const sorted = [...list].sort((a, b) => b.submittedAt.getTime() - a.submittedAt.getTime());
      const [current, ...previous] = sorted;
      reuse.set(
        poi,
        previous.map((prev) => formatProvenance(current, prev))
      );
    }
    return reuse;
  }
}
