/**
 * Console-based log provider.
 * Buffers events in memory for inspection (useful in tests); a long-running
 * process turns retention off.
 * Optionally writes each event to stdout as one JSON line.
 */

import type { ILogProvider, LogEvent, LogLevel } from './ILogProvider.js';
import { isLevelEnabled } from './ILogProvider.js';

export interface ConsoleLogProviderOptions {
  /** Write events to console.log as they arrive. Default: false. */
  outputToConsole?: boolean;
  /** Drop events below this level. Default: 'debug' (keep everything). */
  minLevel?: LogLevel;
  /** Logger name stamped on console output. Default: 'poi-monitor'. */
  name?: string;
  /** Keep accepted events in `events`. Default: true. */
  retainEvents?: boolean;
}

export class ConsoleLogProvider implements ILogProvider {
  /** Inspectable buffer of all accepted events (most recent last). */
  readonly events: LogEvent[] = [];

  private readonly outputToConsole: boolean;
  private readonly minLevel: LogLevel;
  private readonly name: string;
  private readonly retainEvents: boolean;

  constructor(options?: ConsoleLogProviderOptions) {
    this.outputToConsole = options?.outputToConsole ?? false;
    this.minLevel = options?.minLevel ?? 'debug';
    this.name = options?.name ?? 'poi-monitor';
    this.retainEvents = options?.retainEvents ?? true;
  }

  log(event: LogEvent): void {
    if (!isLevelEnabled(event.level, this.minLevel)) return;

    const stamped: LogEvent = {
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
    };
    if (this.retainEvents) this.events.push(stamped);

    if (this.outputToConsole) {
      console.log(
        JSON.stringify({
          timestamp: stamped.timestamp,
          level: stamped.level,
          name: this.name,
          message: stamped.message,
          ...stamped.fields,
        })
      );
    }
  }

  async flush(): Promise<void> {
    // Nothing to flush; events are synchronous.
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

  /** Events at exactly `level`. */
  eventsAt(level: LogLevel): LogEvent[] {
    return this.events.filter((e) => e.level === level);
  }

  /** Clear the event buffer. Useful between test cases. */
  clear(): void {
    this.events.length = 0;
  }
}
