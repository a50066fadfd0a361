/**
 * Domain models: the monitor's view of POI submissions and alerts.
 * Decoupled from the database row shapes in ./database.ts.
 */

// ── Keys & Fingerprints ──

/** One unit of attested work: a subgraph deployment at a block. */
export interface DeploymentBlockKey {
  deploymentId: string;
  blockNumber: number;
}

/** Proof-of-indexing hash, normalized to lowercase hex without prefix. */
export type Fingerprint = string;

/** POI → addresses of the indexers that submitted it, for one key. */
export type FingerprintSet = Map<Fingerprint, Set<string>>;

/**
 * Sorted, de-duplicated POIs present for a key.
 * Two analyses of the same key are the same disagreement iff their identities are equal.
 */
export type DisagreementIdentity = readonly Fingerprint[];

/** One historical POI submission. Append-only on the store side. */
export interface Submission {
  key: DeploymentBlockKey;
  fingerprint: Fingerprint;
  indexerAddress: string;
  submittedAt: Date;
  network: string;
}

/** POI → human-readable provenance lines for its earlier uses. */
export type ReuseMap = Map<Fingerprint, string[]>;

// ── Ledger ──

export interface NotificationRecord {
  key: DeploymentBlockKey;
  identity: DisagreementIdentity;
  message: string;
  sentAt: Date;
}

// ── Detection ──

export type DetectionResult =
  | { kind: 'no-disagreement'; reason: 'no-submissions' | 'consensus' }
  | { kind: 'disagreement'; identity: DisagreementIdentity; submissions: FingerprintSet }
  | { kind: 'already-notified'; identity: DisagreementIdentity };

// ── Cycle reporting ──

export type KeyStage = 'detecting' | 'reusing' | 'formatting' | 'delivering' | 'recording';

export type KeyOutcome =
  | {
      status: 'done';
      key: DeploymentBlockKey;
      action: 'notified' | 'no-disagreement' | 'already-notified';
    }
  | {
      status: 'failed';
      key: DeploymentBlockKey;
      stage: KeyStage;
      error: unknown;
    };

export interface CycleReport {
  startedAt: Date;
  finishedAt: Date;
  /** Distinct candidate keys after de-duplication. */
  candidates: number;
  outcomes: KeyOutcome[];
  /** True when the cycle stopped early on an abort signal. */
  cancelled: boolean;
  /** Ledger rows removed by retention, or null when the purge failed. */
  purged: number | null;
}
