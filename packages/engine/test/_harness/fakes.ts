/**
 * In-process stand-ins for the platform collaborators the engine talks to.
 */

import { vi } from "vitest";
import type { Mock } from "vitest";
import type {
  FrameHandle,
  IAudioSink,
  IFrameScheduler,
  IInputSource,
  InputEvent,
  IRandomSource,
  SynthesizedTone,
} from "@tessera/contracts";

/**
 * Random source that replays a fixed list of values, cycling at the end.
 * A value of `c / 256` makes `randomInt(rng, 256)` return `c`.
 */
export class SequenceRandom implements IRandomSource {
  private index = 0;

  constructor(private values: number[]) {
    if (values.length === 0) {
      throw new Error("SequenceRandom needs at least one value");
    }
  }

  /** Source whose first draws produce the given colors, in order */
  static ofColors(...colors: Array<[number, number, number]>): SequenceRandom {
    return new SequenceRandom(colors.flat().map((c) => c / 256));
  }

  next(): number {
    const value = this.values[this.index % this.values.length];
    this.index++;
    return value;
  }
}

/**
 * Audio sink that records what it was asked to play.
 */
export class MockAudioSink implements IAudioSink {
  tones: SynthesizedTone[] = [];
  stopCount = 0;
  disposed = false;
  failWith: Error | null = null;

  replace(tone: SynthesizedTone): void {
    if (this.failWith) throw this.failWith;
    this.tones.push(tone);
  }

  stop(): void {
    this.stopCount++;
  }

  dispose(): void {
    this.disposed = true;
  }
}

/**
 * Input source driven by the test.
 */
export class MockInputSource implements IInputSource {
  private listeners: Array<(event: InputEvent) => void> = [];
  disposed = false;

  get listenerCount(): number {
    return this.listeners.length;
  }

  onEvent(callback: (event: InputEvent) => void): () => void {
    this.listeners.push(callback);
    return () => {
      const idx = this.listeners.indexOf(callback);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }

  emit(event: InputEvent): void {
    for (const listener of [...this.listeners]) {
      listener(event);
    }
  }

  dispose(): void {
    this.disposed = true;
  }
}

/**
 * Frame scheduler the test advances by hand.
 */
export class ManualFrameScheduler implements IFrameScheduler {
  private nextHandle = 1;
  private pending = new Map<FrameHandle, (now: number) => void>();
  cancelled: FrameHandle[] = [];

  get pendingCount(): number {
    return this.pending.size;
  }

  request(callback: (now: number) => void): FrameHandle {
    const handle = this.nextHandle++;
    this.pending.set(handle, callback);
    return handle;
  }

  cancel(handle: FrameHandle): void {
    if (this.pending.delete(handle)) {
      this.cancelled.push(handle);
    }
  }

  /** Run every frame requested so far with the given timestamp */
  flush(now: number): void {
    const callbacks = [...this.pending.values()];
    this.pending.clear();
    for (const callback of callbacks) {
      callback(now);
    }
  }
}

export interface MockLogger {
  info: Mock;
  warn: Mock;
  error: Mock;
}

export function createLogger(): MockLogger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}
