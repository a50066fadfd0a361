/**
 * Slack incoming-webhook sink.
 * No SDK dependency, uses native fetch.
 */

import type { INotificationSink } from './INotificationSink.js';
import type { ILogProvider } from './ILogProvider.js';
import { TransportError, errorFields } from '../errors.js';

export interface SlackNotificationSinkOptions {
  webhookUrl: string;
  /** Abort the webhook call after this many ms. Default: 10_000. */
  timeoutMs?: number;
}

export class SlackNotificationSink implements INotificationSink {
  private readonly webhookUrl: string;
  private readonly timeoutMs: number;

  constructor(
    options: SlackNotificationSinkOptions,
    private readonly logger: ILogProvider
  ) {
    this.webhookUrl = options.webhookUrl;
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  async deliver(message: string): Promise<boolean> {
    try {
      await this.post(message);
      this.logger.info('Sent Slack notification');
      return true;
    } catch (err) {
      const failure =
        err instanceof TransportError
          ? err
          : new TransportError('Slack webhook request failed', undefined, { cause: err });
      this.logger.error('Failed to send Slack notification', {
        ...errorFields(failure),
        ...(err !== failure && { cause: errorFields(err) }),
      });
      return false;
    }
  }

  private async post(message: string): Promise<void> {
    const res = await fetch(this.webhookUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ text: message }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!res.ok) {
      const detail = await res.text().catch(() => '');
      throw new TransportError(`Slack webhook error (${res.status})`, {
        status: res.status,
        ...(detail && { detail }),
      });
    }
  }
}
