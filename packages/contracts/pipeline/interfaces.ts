/**
 * Component Interfaces
 *
 * Contracts between the screensaver core and the platform it runs on:
 * randomness, audio output, input, frame scheduling and rendering.
 * The core only ever talks to these, so it runs unchanged under tests.
 */

import type { SynthesizedTone } from "../audio/audio";
import type { InputEvent } from "../input/input";
import type { SceneFrame } from "../scene/scene";

// ============================================================================
// Randomness
// ============================================================================

/**
 * Source of uniformly distributed numbers in [0, 1).
 * Injected wherever randomness is needed so tests can pin the sequence.
 */
export interface IRandomSource {
  next(): number;
}

// ============================================================================
// Audio
// ============================================================================

/**
 * Audio output that plays at most one tone at a time.
 */
export interface IAudioSink {
  /**
   * Stop whatever this sink is still playing and start `tone`.
   * Must not block; playback continues in the background.
   */
  replace(tone: SynthesizedTone): void;

  /** Stop the current tone, if any */
  stop(): void;

  /** Release the underlying device. The sink is unusable afterwards. */
  dispose(): void;
}

// ============================================================================
// Input
// ============================================================================

export interface IInputSource {
  /**
   * Subscribe to input events.
   * Returns an unsubscribe function.
   */
  onEvent(callback: (event: InputEvent) => void): () => void;

  /** Clean up resources */
  dispose?(): void;
}

// ============================================================================
// Frame scheduling
// ============================================================================

export type FrameHandle = number;

/**
 * Schedules the next loop iteration (requestAnimationFrame in the browser).
 * The callback receives a monotonic timestamp in milliseconds.
 */
export interface IFrameScheduler {
  request(callback: (now: number) => void): FrameHandle;
  cancel(handle: FrameHandle): void;
}

// ============================================================================
// Renderer
// ============================================================================

/**
 * Renderer that draws a scene frame to output.
 */
export interface IRenderer {
  id: string;
  render(scene: SceneFrame): void;

  /** Release the drawing surface */
  detach?(): void;
}
