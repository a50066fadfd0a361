/**
 * Supabase implementation of INotificationRepository.
 * The identity is stored as a sorted text[] of hex POIs; lookups compare it as a
 * set (contains + contained-by) so stored order never matters.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { INotificationRepository } from './INotificationRepository.js';
import type { PoiNotificationRow } from '../types/database.js';
import type {
  DeploymentBlockKey,
  DisagreementIdentity,
  NotificationRecord,
} from '../types/models.js';
import { InvariantViolation } from '../errors.js';
import { disagreementIdentity } from '../services/fingerprints.js';
import { storeSignal, toStorageError } from './supabaseErrors.js';

const TABLE = 'poi_notifications';
const DAY_MS = 24 * 60 * 60 * 1000;

export class SupabaseNotificationRepository implements INotificationRepository {
  constructor(
    private readonly db: SupabaseClient,
    private readonly timeoutMs: number
  ) {}

  async hasNotified(key: DeploymentBlockKey, identity: DisagreementIdentity): Promise<boolean> {
    const pois = [...disagreementIdentity(identity)];
    const signal = storeSignal(this.timeoutMs);
    const { data, error } = await this.db
      .from(TABLE)
      .select('id')
      .eq('deployment_id', key.deploymentId)
      .eq('block_number', key.blockNumber)
      .contains('poi_set', pois)
      .containedBy('poi_set', pois)
      .limit(2)
      .abortSignal(signal);

    if (error) throw toStorageError('check notification ledger', error, signal, this.timeoutMs);

    const matches = data ?? [];
    if (matches.length > 1) {
      throw new InvariantViolation('Ledger holds more than one record for the same identity', {
        deploymentId: key.deploymentId,
        blockNumber: key.blockNumber,
        identity: pois,
      });
    }
    return matches.length === 1;
  }

  async recordNotified(
    key: DeploymentBlockKey,
    identity: DisagreementIdentity,
    message: string
  ): Promise<void> {
    const signal = storeSignal(this.timeoutMs);
    const { error } = await this.db
      .from(TABLE)
      .upsert(
        {
          deployment_id: key.deploymentId,
          block_number: key.blockNumber,
          poi_set: [...disagreementIdentity(identity)],
          message,
        },
        { onConflict: 'deployment_id,block_number,poi_set', ignoreDuplicates: true }
      )
      .abortSignal(signal);

    if (error) throw toStorageError('record notification', error, signal, this.timeoutMs);
  }

  async purgeOlderThan(days: number): Promise<number> {
    const cutoff = new Date(Date.now() - days * DAY_MS).toISOString();
    const signal = storeSignal(this.timeoutMs);
    const { count, error } = await this.db
      .from(TABLE)
      .delete({ count: 'exact' })
      .lt('sent_at', cutoff)
      .abortSignal(signal);

    if (error) throw toStorageError('purge notifications', error, signal, this.timeoutMs);
    return count ?? 0;
  }

  async findByKey(key: DeploymentBlockKey): Promise<NotificationRecord[]> {
    const signal = storeSignal(this.timeoutMs);
    const { data, error } = await this.db
      .from(TABLE)
      .select('*')
      .eq('deployment_id', key.deploymentId)
      .eq('block_number', key.blockNumber)
      .order('sent_at', { ascending: false })
      .abortSignal(signal);

    if (error) throw toStorageError('fetch notifications', error, signal, this.timeoutMs);
    return ((data ?? []) as PoiNotificationRow[]).map((row) => ({
      key: { deploymentId: row.deployment_id, blockNumber: Number(row.block_number) },
      identity: disagreementIdentity(row.poi_set),
      message: row.message,
      sentAt: new Date(row.sent_at),
    }));
  }
}
