/**
 * Axiom log provider.
 * Buffers events and sends them in batches to Axiom's ingest API.
 * Non-blocking: a failed flush keeps the events for the next attempt.
 * Disabled (no-op) when apiToken is empty.
 */

import type { ILogProvider, LogEvent, LogLevel } from './ILogProvider.js';
import { isLevelEnabled } from './ILogProvider.js';

export interface AxiomLogProviderOptions {
  /** Axiom API token (Bearer). Empty string disables sending. */
  apiToken: string;
  /** Axiom dataset name. */
  dataset: string;
  /** Stamped on every event as `service`. Default: 'poi-monitor'. */
  service?: string;
  /** Drop events below this level. Default: 'info'. */
  minLevel?: LogLevel;
  /** Flush after this many buffered events. Default: 50. */
  flushThreshold?: number;
  /** Auto-flush interval in ms. Default: 10_000 (10s). 0 disables. */
  flushIntervalMs?: number;
  /** Abort an ingest request after this many ms. Default: 10_000. */
  requestTimeoutMs?: number;
  /** Keep at most this many unsent events; oldest are dropped first. Default: 5_000. */
  maxBufferSize?: number;
}

const AXIOM_INGEST_URL = 'https://api.axiom.co/v1/datasets';

export class AxiomLogProvider implements ILogProvider {
  private buffer: LogEvent[] = [];
  private readonly apiToken: string;
  private readonly dataset: string;
  private readonly service: string;
  private readonly minLevel: LogLevel;
  private readonly flushThreshold: number;
  private readonly flushIntervalMs: number;
  private readonly requestTimeoutMs: number;
  private readonly maxBufferSize: number;
  private flushTimer: ReturnType<typeof setInterval> | null = null;
  private readonly enabled: boolean;
  private inFlight: Promise<boolean> | null = null;
  /** Leading buffer entries that belong to the in-flight batch. */
  private sending = 0;

  /** Number of ingest attempts that did not succeed. */
  failedFlushes = 0;

  constructor(options: AxiomLogProviderOptions) {
    this.apiToken = options.apiToken;
    this.dataset = options.dataset;
    this.service = options.service ?? 'poi-monitor';
    this.minLevel = options.minLevel ?? 'info';
    this.flushThreshold = options.flushThreshold ?? 50;
    this.flushIntervalMs = options.flushIntervalMs ?? 10_000;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 10_000;
    this.maxBufferSize = options.maxBufferSize ?? 5_000;
    this.enabled = Boolean(this.apiToken);

    if (this.enabled && this.flushIntervalMs > 0) {
      this.flushTimer = setInterval(() => {
        void this.flush();
      }, this.flushIntervalMs);
      // Don't hold the process open for the timer
      this.flushTimer.unref();
    }
  }

  log(event: LogEvent): void {
    if (!this.enabled || !isLevelEnabled(event.level, this.minLevel)) return;

    const stamped: LogEvent = {
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
    };
    this.buffer.push(stamped);
    if (this.buffer.length > this.maxBufferSize) {
      const dropped = this.buffer.length - this.maxBufferSize;
      this.buffer.splice(0, dropped);
      // Trimmed events may belong to the batch being sent
      this.sending = Math.max(0, this.sending - dropped);
    }

    if (this.buffer.length >= this.flushThreshold) {
      void this.flush();
    }
  }

  /**
   * Send until the buffer is empty, including events logged while a send was
   * in flight. Stops at the first failed send; those events stay buffered.
   */
  async flush(): Promise<void> {
    if (!this.enabled) return;

    while (this.buffer.length > 0) {
      if (!this.inFlight) {
        this.inFlight = this.send().finally(() => {
          this.inFlight = null;
        });
      }
      if (!(await this.inFlight)) return;
    }
  }

  /** Stop the auto-flush timer and flush remaining events. */
  async dispose(): Promise<void> {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
    await this.flush();
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'info', message, fields });
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'warn', message, fields });
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'error', message, fields });
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'debug', message, fields });
  }

  private async send(): Promise<boolean> {
    const batch = [...this.buffer];
    this.sending = batch.length;
    const payload = batch.map((event) => ({
      _time: event.timestamp,
      service: this.service,
      level: event.level,
      message: event.message,
      ...(event.fields && { fields: event.fields }),
    }));

    try {
      const response = await fetch(`${AXIOM_INGEST_URL}/${this.dataset}/ingest`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiToken}`,
        },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });

      if (response.ok) {
        // Only clear the events of this batch that are still buffered
        this.buffer.splice(0, this.sending);
        return true;
      }
      this.failedFlushes++;
      return false;
    } catch {
      // Network error or timeout: events stay buffered for the next flush
      this.failedFlushes++;
      return false;
    } finally {
      this.sending = 0;
    }
  }
}
