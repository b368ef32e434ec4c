/**
 * Notification contracts
 */

import type { MonitorEvent } from '@lazarus/core';

/**
 * Fire-and-forget event publisher used by the control loop
 */
export interface Notifier {
  publish(event: MonitorEvent): void;
}

/**
 * A delivery channel. Rejections are logged by the hub and never reach the publisher.
 * `signal` aborts when the hub stops waiting for the delivery.
 */
export interface NotificationSink {
  readonly name: string;
  deliver(event: MonitorEvent, signal?: AbortSignal): Promise<void>;
}
