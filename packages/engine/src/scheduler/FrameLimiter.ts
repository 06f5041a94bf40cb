import type { Ms } from "@tessera/contracts";
import { TARGET_FPS } from "../config";

/** Slack for rAF timestamps that arrive a hair before the frame boundary */
const FRAME_TOLERANCE_MS = 1;

/**
 * Caps how often the loop does work. `requestAnimationFrame` may fire
 * faster than the target rate on high-refresh displays; frames that come
 * in early are skipped.
 */
export class FrameLimiter {
  readonly minFrameMs: Ms;
  private lastFrame: number | null = null;

  constructor(fps: number = TARGET_FPS) {
    if (!Number.isFinite(fps) || fps <= 0) {
      throw new RangeError(`Frame rate must be positive, got ${fps}`);
    }
    this.minFrameMs = 1000 / fps;
  }

  /**
   * Whether a frame at `now` should run. Records it if so.
   */
  shouldRun(now: number): boolean {
    if (this.lastFrame !== null && now - this.lastFrame < this.minFrameMs - FRAME_TOLERANCE_MS) {
      return false;
    }
    this.lastFrame = now;
    return true;
  }

  reset(): void {
    this.lastFrame = null;
  }
}
