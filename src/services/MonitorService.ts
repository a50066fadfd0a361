/**
 * Monitoring cycle orchestrator.
 *
 * Per key: detect → (disagreement) reuse → format → deliver → record.
 * Keys run one at a time so the ledger check and the ledger write for a key
 * can't interleave with another check of the same key. A failing key becomes a
 * `failed` outcome and the batch moves on; only an InvariantViolation stops it.
 * The ledger is written only after the sink confirms delivery, so an
 * undelivered disagreement is retried next cycle.
 */

import type { INotificationRepository } from '../repositories/INotificationRepository.js';
import type { IDiscoverySource } from '../providers/IDiscoverySource.js';
import type { INotificationSink } from '../providers/INotificationSink.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type {
  CycleReport,
  DeploymentBlockKey,
  FingerprintSet,
  KeyOutcome,
  KeyStage,
  ReuseMap,
} from '../types/models.js';
import type { DiscrepancyDetector } from './DiscrepancyDetector.js';
import type { ReuseAnalyzer } from './ReuseAnalyzer.js';
import {
  AppError,
  CycleInProgressError,
  DiscoveryError,
  InvariantViolation,
  TimeoutError,
  TransportError,
  errorFields,
} from '../errors.js';
import { formatDiscrepancy } from './AlertFormatter.js';
import { dedupeKeys, keyFields } from './fingerprints.js';
import { withTimeout } from '../utils/withTimeout.js';

export interface MonitorServiceOptions {
  /** Ledger records older than this are purged after every cycle. */
  retentionDays: number;
  /** Upper bound for each awaited step of a key (and for the purge). */
  stepTimeoutMs: number;
}

export interface RunOptions {
  /** Checked between keys; the in-flight key always finishes its current step. */
  signal?: AbortSignal;
}

export class MonitorService {
  private running = false;

  constructor(
    private readonly discovery: IDiscoverySource,
    private readonly detector: DiscrepancyDetector,
    private readonly reuseAnalyzer: ReuseAnalyzer,
    private readonly sink: INotificationSink,
    private readonly notificationRepo: INotificationRepository,
    private readonly logger: ILogProvider,
    private readonly options: MonitorServiceOptions
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  /** Discover candidate keys, then run a cycle over them. */
  async runOnce(opts: RunOptions = {}): Promise<CycleReport> {
    return this.exclusive(async () => {
      this.logger.info('Running POI check iteration');
      let candidates: DeploymentBlockKey[];
      try {
        candidates = await this.discovery.listCandidateKeys(opts.signal);
      } catch (err) {
        if (opts.signal?.aborted) {
          this.logger.info('Candidate key discovery cancelled');
        } else {
          this.logger.error('Failed to fetch candidate keys', errorFields(err));
        }
        if (err instanceof DiscoveryError) throw err;
        throw new DiscoveryError('Candidate key discovery failed', undefined, { cause: err });
      }
      return this.processCycle(candidates, opts);
    });
  }

  /** Check every candidate key once, then purge expired ledger records. */
  async runCycle(candidates: Iterable<DeploymentBlockKey>, opts: RunOptions = {}): Promise<CycleReport> {
    return this.exclusive(() => this.processCycle(candidates, opts));
  }

  private async exclusive<T>(fn: () => Promise<T>): Promise<T> {
    if (this.running) throw new CycleInProgressError();
    this.running = true;
    try {
      return await fn();
    } finally {
      this.running = false;
    }
  }

  private async processCycle(
    candidates: Iterable<DeploymentBlockKey>,
    opts: RunOptions
  ): Promise<CycleReport> {
    const startedAt = new Date();
    const keys = dedupeKeys(candidates);
    const outcomes: KeyOutcome[] = [];
    let cancelled = false;

    for (const key of keys) {
      if (opts.signal?.aborted) {
        cancelled = true;
        this.logger.info('Cycle cancelled, skipping remaining keys', {
          remaining: keys.length - outcomes.length,
        });
        break;
      }
      // InvariantViolation escapes here and abandons the cycle, purge included
      outcomes.push(await this.processKey(key));
    }

    const purged = await this.purge();
    const report: CycleReport = {
      startedAt,
      finishedAt: new Date(),
      candidates: keys.length,
      outcomes,
      cancelled,
      purged,
    };
    this.logSummary(report);
    return report;
  }

  private async processKey(key: DeploymentBlockKey): Promise<KeyOutcome> {
    let stage: KeyStage = 'detecting';
    try {
      const detection = await this.step('detect discrepancy', () => this.detector.detect(key));

      if (detection.kind === 'already-notified') {
        this.logger.debug('Already notified about this POI set', keyFields(key));
        return { status: 'done', key, action: 'already-notified' };
      }
      if (detection.kind === 'no-disagreement') {
        this.logger.debug(
          detection.reason === 'no-submissions'
            ? 'No POI submissions found'
            : 'All indexers agree on POI',
          keyFields(key)
        );
        return { status: 'done', key, action: 'no-disagreement' };
      }

      stage = 'reusing';
      const reuse = await this.analyzeReuse(key, detection.submissions);

      stage = 'formatting';
      const message = formatDiscrepancy(key, detection.submissions, reuse);

      stage = 'delivering';
      const delivered = await this.step('deliver notification', () => this.sink.deliver(message));
      if (!delivered) {
        throw new TransportError('Notification was not delivered; will retry next cycle');
      }

      stage = 'recording';
      await this.step('record notification', () =>
        this.notificationRepo.recordNotified(key, detection.identity, message)
      );

      this.logger.info('Reported POI discrepancy', {
        ...keyFields(key),
        poiCount: detection.identity.length,
        reusedPois: reuse.size,
      });
      return { status: 'done', key, action: 'notified' };
    } catch (err) {
      if (err instanceof InvariantViolation) {
        this.logger.error('Ledger invariant violated, stopping cycle', {
          ...keyFields(key),
          stage,
          ...errorFields(err),
        });
        throw err;
      }
      this.logger.error('Error processing submission', {
        ...keyFields(key),
        stage,
        ...errorFields(err),
      });
      return { status: 'failed', key, stage, error: err };
    }
  }

  /** Reuse info is optional: a slow lookup degrades to no reuse annotations. */
  private async analyzeReuse(
    key: DeploymentBlockKey,
    submissions: FingerprintSet
  ): Promise<ReuseMap> {
    try {
      return await this.step('analyze POI reuse', () => this.reuseAnalyzer.analyzeReuse(submissions));
    } catch (err) {
      if (!(err instanceof TimeoutError)) throw err;
      this.logger.warn('POI reuse analysis timed out, reporting without reuse info', {
        ...keyFields(key),
        ...errorFields(err),
      });
      return new Map();
    }
  }

  private async purge(): Promise<number | null> {
    try {
      const removed = await this.step('purge notifications', () =>
        this.notificationRepo.purgeOlderThan(this.options.retentionDays)
      );
      if (removed > 0) {
        this.logger.info('Purged old POI notifications', {
          removed,
          retentionDays: this.options.retentionDays,
        });
      }
      return removed;
    } catch (err) {
      this.logger.error('Failed to purge old POI notifications', errorFields(err));
      return null;
    }
  }

  private step<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return withTimeout(operation, this.options.stepTimeoutMs, fn);
  }

  private logSummary(report: CycleReport): void {
    const count = (predicate: (o: KeyOutcome) => boolean): number =>
      report.outcomes.filter(predicate).length;

    this.logger.info('POI check iteration finished', {
      candidates: report.candidates,
      notified: count((o) => o.status === 'done' && o.action === 'notified'),
      alreadyNotified: count((o) => o.status === 'done' && o.action === 'already-notified'),
      failed: count((o) => o.status === 'failed'),
      failedCodes: report.outcomes.flatMap((o) =>
        o.status === 'failed' && o.error instanceof AppError ? [o.error.code] : []
      ),
      cancelled: report.cancelled,
      purged: report.purged,
      durationMs: report.finishedAt.getTime() - report.startedAt.getTime(),
    });
  }
}
