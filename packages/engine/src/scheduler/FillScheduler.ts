/**
 * Fill Scheduler
 *
 * Decides when the grid gains a new cell. Driven by the session clock on
 * every frame and level-triggered on elapsed time, so the fill rate does
 * not depend on how often frames are drawn.
 */

import type { Ms, SessionMs } from "@tessera/contracts";
import { FILL_BPM } from "../config";

export type FillSchedulerState = "idle" | "triggering";

export interface FillSchedulerConfig {
  /**
   * Beats per minute; one cell per beat.
   * @default 120
   */
  bpm?: number;

  /**
   * Time the cadence is measured from.
   * @default 0
   */
  origin?: SessionMs;
}

const DEFAULT_CONFIG: Required<FillSchedulerConfig> = {
  bpm: FILL_BPM,
  origin: 0,
};

/** Milliseconds per beat, e.g. 120 BPM → 500ms */
export function bpmToIntervalMs(bpm: number): Ms {
  if (!Number.isFinite(bpm) || bpm <= 0) {
    throw new RangeError(`BPM must be positive, got ${bpm}`);
  }
  return 60000 / bpm;
}

export class FillScheduler {
  readonly intervalMs: Ms;

  private currentState: FillSchedulerState = "idle";
  private lastTrigger: SessionMs;

  constructor(config: FillSchedulerConfig = {}) {
    const cfg = { ...DEFAULT_CONFIG, ...config };
    this.intervalMs = bpmToIntervalMs(cfg.bpm);
    this.lastTrigger = cfg.origin;
  }

  get state(): FillSchedulerState {
    return this.currentState;
  }

  get lastTriggerTime(): SessionMs {
    return this.lastTrigger;
  }

  /**
   * Check the clock. When at least one interval has passed since the last
   * trigger, run `onTrigger` once and restart the interval from `t`.
   *
   * @returns whether `onTrigger` ran
   */
  tick(t: SessionMs, onTrigger: (t: SessionMs) => void): boolean {
    if (this.currentState === "triggering") return false;
    if (t - this.lastTrigger < this.intervalMs) return false;

    this.currentState = "triggering";
    try {
      onTrigger(t);
    } finally {
      this.lastTrigger = t;
      this.currentState = "idle";
    }
    return true;
  }

  /** Restart the cadence from `t` */
  reset(t: SessionMs = 0): void {
    this.lastTrigger = t;
    this.currentState = "idle";
  }
}
