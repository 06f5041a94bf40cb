import type { FrameHandle, IFrameScheduler } from "@tessera/contracts";

/**
 * requestAnimationFrame-backed IFrameScheduler.
 * For use in browser environments.
 */
export const animationFrameScheduler: IFrameScheduler = {
  request(callback: (now: number) => void): FrameHandle {
    return requestAnimationFrame(callback);
  },
  cancel(handle: FrameHandle): void {
    cancelAnimationFrame(handle);
  },
};
