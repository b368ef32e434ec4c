import { describeRedeployOutcome } from '@lazarus/core';
import type { MonitorEvent } from '@lazarus/core';

/**
 * One-line summary of an event for chat and log sinks
 */
export function summarizeEvent(event: MonitorEvent): string {
  switch (event.type) {
    case 'STATUS_CHANGED':
      return `${event.targetId}: ${event.oldStatus} -> ${event.newStatus}`;
    case 'TARGET_RECOVERED':
      return `${event.targetId} recovered (was ${event.previousStatus})`;
    case 'REDEPLOY_ATTEMPTED':
      return `${event.targetId}: ${event.attempt.trigger.toLowerCase()} redeploy ${describeRedeployOutcome(event.outcome)}`;
  }
}
