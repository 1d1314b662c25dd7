import type { Detection } from "./types.js";

export type GateState = "READY" | "COOLING";
export type GateDecision = "allow" | "deny";

export interface CooldownState {
  lastTriggerAt: number | null;
}

/**
 * Level-triggered cooldown between remote analysis requests.
 *
 * The monitor loop is its only caller and evaluates it once per frame. Times are
 * epoch milliseconds.
 */
export class CooldownGate {
  private readonly cooldownMs: number;
  private readonly cell: CooldownState = { lastTriggerAt: null };

  constructor(cooldownSeconds: number) {
    if (!Number.isFinite(cooldownSeconds) || cooldownSeconds < 0) {
      throw new Error(`cooldownSeconds must be a non-negative number, got ${cooldownSeconds}`);
    }
    this.cooldownMs = cooldownSeconds * 1000;
  }

  state(now: number): GateState {
    const last = this.cell.lastTriggerAt;
    if (last === null || now - last >= this.cooldownMs) {
      return "READY";
    }
    return "COOLING";
  }

  evaluate(detection: Detection, now: number): GateDecision {
    if (this.state(now) === "COOLING") {
      return "deny";
    }
    if (!hasPerson(detection)) {
      return "deny";
    }
    this.cell.lastTriggerAt = now;
    return "allow";
  }

  get lastTriggerAt(): number | null {
    return this.cell.lastTriggerAt;
  }
}

export function hasPerson(detection: Detection): boolean {
  return detection.label === "person" && detection.boxes.length > 0;
}
