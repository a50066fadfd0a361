/**
 * Notification ledger interface.
 * Remembers which exact disagreement identity has been alerted for each key.
 */

import type {
  DeploymentBlockKey,
  DisagreementIdentity,
  NotificationRecord,
} from '../types/models.js';

export interface INotificationRepository {
  /** Set-equality lookup of `identity` for `key`. */
  hasNotified(key: DeploymentBlockKey, identity: DisagreementIdentity): Promise<boolean>;

  /** Atomically record a delivered alert. Recording an existing identity is a no-op. */
  recordNotified(
    key: DeploymentBlockKey,
    identity: DisagreementIdentity,
    message: string
  ): Promise<void>;

  /** Delete records sent more than `days` ago, resolved or not. Returns the count removed. */
  purgeOlderThan(days: number): Promise<number>;

  /** All records for a key, newest first. */
  findByKey(key: DeploymentBlockKey): Promise<NotificationRecord[]>;
}
