/**
 * Supabase implementation of IPoiRepository.
 * Reads Graphix's POI tables through SQL functions that hex-encode byte columns.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IPoiRepository } from './IPoiRepository.js';
import type { CurrentPoiRow, PoiOccurrenceRow } from '../types/database.js';
import type { DeploymentBlockKey, Fingerprint, FingerprintSet, Submission } from '../types/models.js';
import { buildFingerprintSet, normalizeHex } from '../services/fingerprints.js';
import { storeSignal, toStorageError } from './supabaseErrors.js';

export class SupabasePoiRepository implements IPoiRepository {
  constructor(
    private readonly db: SupabaseClient,
    private readonly timeoutMs: number
  ) {}

  async currentSet(key: DeploymentBlockKey): Promise<FingerprintSet> {
    const signal = storeSignal(this.timeoutMs);
    const { data, error } = await this.db
      .rpc('poi_monitor_current_pois', {
        p_deployment_id: key.deploymentId,
        p_block_number: key.blockNumber,
      })
      .abortSignal(signal);

    if (error) throw toStorageError('fetch current POIs', error, signal, this.timeoutMs);
    const rows = (data ?? []) as CurrentPoiRow[];
    return buildFingerprintSet(
      rows.map((row) => ({ poi: row.poi, indexerAddress: row.indexer_address }))
    );
  }

  async historicalOccurrences(fingerprints: readonly Fingerprint[]): Promise<Submission[]> {
    if (fingerprints.length === 0) return [];

    const signal = storeSignal(this.timeoutMs);
    const { data, error } = await this.db
      .rpc('poi_monitor_poi_occurrences', { p_pois: [...fingerprints] })
      .abortSignal(signal);

    if (error) throw toStorageError('fetch POI occurrences', error, signal, this.timeoutMs);
    const rows = (data ?? []) as PoiOccurrenceRow[];
    return rows.map((row) => ({
      key: { deploymentId: row.deployment_id, blockNumber: Number(row.block_number) },
      fingerprint: normalizeHex(row.poi),
      indexerAddress: normalizeHex(row.indexer_address),
      submittedAt: new Date(row.submitted_at),
      network: row.network_name,
    }));
  }
}
