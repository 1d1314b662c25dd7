import type { AlertState } from "../types.js";

export type AlertListener = (next: AlertState, previous: AlertState) => void;

/**
 * Single-slot holder for the alert the render step shows.
 *
 * Every write swaps in a frozen snapshot, so a reader holds either the old value or
 * the new one, never a mix. A publish carrying an older frame than the held value is
 * dropped.
 */
export class AlertStore {
  private snapshot: AlertState;
  private readonly listeners = new Set<AlertListener>();

  constructor(initial: AlertState) {
    this.snapshot = Object.freeze({ ...initial });
  }

  current(): AlertState {
    return this.snapshot;
  }

  publish(next: AlertState): boolean {
    const previous = this.snapshot;
    if (next.sourceFrameSeq < previous.sourceFrameSeq) {
      return false;
    }
    this.snapshot = Object.isFrozen(next) ? next : Object.freeze({ ...next });
    for (const listener of this.listeners) {
      listener(this.snapshot, previous);
    }
    return true;
  }

  subscribe(listener: AlertListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
