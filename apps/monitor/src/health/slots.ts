/**
 * Per-target runtime slots shared by the health tracker and the redeploy coordinator
 */

import type { HealthState, RedeployTrigger } from '@lazarus/core';

export interface InFlightAttempt {
  readonly id: string;
  readonly trigger: RedeployTrigger;
  readonly requestedAt: string;
}

export interface TargetSlot {
  readonly targetId: string;
  health: HealthState;
  /** The attempt started on this slot; the status holds REDEPLOYING while set */
  inFlight: InFlightAttempt | null;
}

/**
 * A slot lives exactly as long as its target registration. Removing and re-adding
 * an id creates a new slot, so holders of the old one can tell their work is stale.
 */
export class SlotTable {
  private slots = new Map<string, TargetSlot>();

  create(targetId: string): TargetSlot {
    const slot: TargetSlot = {
      targetId,
      health: {
        status: 'UNKNOWN',
        consecutiveFailures: 0,
        lastTransitionAt: null,
        lastRedeployAt: null,
        lastProbe: null,
      },
      inFlight: null,
    };
    this.slots.set(targetId, slot);
    return slot;
  }

  get(targetId: string): TargetSlot | undefined {
    return this.slots.get(targetId);
  }

  delete(targetId: string): boolean {
    return this.slots.delete(targetId);
  }

  /** Whether `slot` is still the live slot for its target */
  isCurrent(slot: TargetSlot): boolean {
    return this.slots.get(slot.targetId) === slot;
  }

  values(): IterableIterator<TargetSlot> {
    return this.slots.values();
  }
}
