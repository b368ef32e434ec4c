/**
 * Fans monitor events out to every configured sink
 */

import { DEFAULT_TIMEOUTS, createLogger, createTimeoutSignal, errorMessage, withTimeout } from '@lazarus/core';
import type { Logger, MonitorEvent } from '@lazarus/core';
import type { NotificationSink, Notifier } from './types.js';

export interface NotifierHubOptions {
  sinks?: NotificationSink[];
  deliveryTimeoutMs?: number;
  logger?: Logger;
}

export class NotifierHub implements Notifier {
  private sinks: NotificationSink[];
  private pending = new Set<Promise<void>>();
  private readonly deliveryTimeoutMs: number;
  private readonly logger: Logger;

  constructor(options: NotifierHubOptions = {}) {
    this.sinks = [...(options.sinks ?? [])];
    this.deliveryTimeoutMs = options.deliveryTimeoutMs ?? DEFAULT_TIMEOUTS.NOTIFY;
    this.logger = options.logger ?? createLogger('notifier');
  }

  addSink(sink: NotificationSink): void {
    this.sinks.push(sink);
  }

  get sinkNames(): string[] {
    return this.sinks.map((sink) => sink.name);
  }

  /**
   * Deliver to every sink in the background. Never throws.
   */
  publish(event: MonitorEvent): void {
    for (const sink of this.sinks) {
      const delivery = this.deliver(sink, event);
      this.pending.add(delivery);
      void delivery.finally(() => {
        this.pending.delete(delivery);
      });
    }
  }

  /**
   * Resolves once every delivery started so far has settled
   */
  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.allSettled(Array.from(this.pending));
    }
  }

  private async deliver(sink: NotificationSink, event: MonitorEvent): Promise<void> {
    try {
      await withTimeout(
        sink.deliver(event, createTimeoutSignal(this.deliveryTimeoutMs)),
        this.deliveryTimeoutMs,
        `${sink.name} delivery timed out`
      );
    } catch (error) {
      this.logger.warn(`Failed to deliver ${event.type} for '${event.targetId}' via ${sink.name}`, {
        error: errorMessage(error),
      });
    }
  }
}
