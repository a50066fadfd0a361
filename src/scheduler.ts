/**
 * Fixed-interval runner for monitoring cycles.
 * Cycles never overlap: the next wait starts only after the previous cycle returns.
 */

import type { ILogProvider } from './providers/ILogProvider.js';
import type { MonitorService } from './services/MonitorService.js';
import type { CycleReport } from './types/models.js';
import { InvariantViolation, errorFields } from './errors.js';
import { sleep } from './utils/withTimeout.js';

export interface PollingSchedulerOptions {
  intervalMs: number;
  /** Called after every completed cycle. */
  onCycle?: (report: CycleReport) => void;
}

export class PollingScheduler {
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(
    private readonly monitor: MonitorService,
    private readonly logger: ILogProvider,
    private readonly options: PollingSchedulerOptions
  ) {}

  get isRunning(): boolean {
    return this.loop !== null;
  }

  /**
   * Run cycles until stop() is called. Resolves after a clean stop; rejects on an
   * InvariantViolation, which is not worth retrying.
   */
  start(): Promise<void> {
    if (this.loop) return this.loop;
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal).finally(() => {
      this.loop = null;
      this.controller = null;
    });
    return this.loop;
  }

  /** Ask the loop to stop after the in-flight key and wait for it. */
  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) return;
    this.controller?.abort();
    await loop.catch((err: unknown) => {
      this.logger.error('Scheduler stopped with an error', errorFields(err));
    });
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        const report = await this.monitor.runOnce({ signal });
        this.options.onCycle?.(report);
      } catch (err) {
        if (err instanceof InvariantViolation) throw err;
        // Interrupted by stop(); the loop condition ends it
        if (signal.aborted) continue;
        this.logger.error('POI check iteration failed, retrying next interval', errorFields(err));
      }
      await sleep(this.options.intervalMs, signal);
    }
    this.logger.info('Scheduler stopped');
  }
}
