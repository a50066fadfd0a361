/**
 * Outbound alert transport.
 * Implementations report delivery with a boolean and never throw for
 * ordinary transport failures.
 */

export interface INotificationSink {
  /** True when the message was accepted by the transport. */
  deliver(message: string): Promise<boolean>;
}
