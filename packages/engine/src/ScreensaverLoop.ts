/**
 * Screensaver Loop
 *
 * Single-threaded frame loop: on every scheduled frame it advances the
 * session clock and redraws, capped at the target frame rate. Any exit
 * event (quit, key press, pointer press) ends the loop with code 0; a frame
 * that throws ends it with code 1.
 *
 * Teardown runs exactly once on every exit path and releases the frame
 * request, the input subscription, the audio sink and the renderer. A step
 * that fails is logged and the remaining steps still run.
 */

import type {
  IFrameScheduler,
  IInputSource,
  IRenderer,
  InputEvent,
  Logger,
  FrameHandle,
  SessionMs,
} from "@tessera/contracts";
import { isExitEvent } from "@tessera/contracts";
import type { ScreensaverSession } from "./ScreensaverSession";
import { FrameLimiter } from "./scheduler/FrameLimiter";
import { TARGET_FPS } from "./config";

export type ExitCode = 0 | 1;

export type LoopState = "created" | "running" | "stopped";

export interface ScreensaverLoopConfig {
  session: ScreensaverSession;
  renderer: IRenderer;
  input: IInputSource;
  frames: IFrameScheduler;

  /** Frame-rate cap */
  fps?: number;

  logger?: Logger;
}

export class ScreensaverLoop {
  private session: ScreensaverSession;
  private renderer: IRenderer;
  private input: IInputSource;
  private frames: IFrameScheduler;
  private limiter: FrameLimiter;
  private logger: Logger;

  private currentState: LoopState = "created";
  private pendingFrame: FrameHandle | null = null;
  private unsubscribeInput: (() => void) | null = null;
  private origin: number | null = null;
  private code: ExitCode | null = null;
  private exitListeners: Array<(code: ExitCode) => void> = [];

  constructor(config: ScreensaverLoopConfig) {
    this.session = config.session;
    this.renderer = config.renderer;
    this.input = config.input;
    this.frames = config.frames;
    this.limiter = new FrameLimiter(config.fps ?? TARGET_FPS);
    this.logger = config.logger ?? console;
  }

  get state(): LoopState {
    return this.currentState;
  }

  /** Exit code once stopped, otherwise null */
  get exitCode(): ExitCode | null {
    return this.code;
  }

  start(): void {
    if (this.currentState !== "created") {
      throw new Error(`ScreensaverLoop cannot start from state "${this.currentState}"`);
    }

    this.currentState = "running";
    this.unsubscribeInput = this.input.onEvent((event) => this.handleInput(event));
    this.scheduleNext();
  }

  /**
   * Subscribe to loop exit. Fires once with the exit code.
   * Returns an unsubscribe function.
   */
  onExit(callback: (code: ExitCode) => void): () => void {
    this.exitListeners.push(callback);
    return () => {
      const idx = this.exitListeners.indexOf(callback);
      if (idx >= 0) this.exitListeners.splice(idx, 1);
    };
  }

  /**
   * End the loop and release everything it holds. Safe to call repeatedly;
   * only the first call has an effect.
   */
  stop(code: ExitCode = 0): void {
    if (this.currentState === "stopped") return;
    this.currentState = "stopped";

    const steps: Array<[string, () => void]> = [
      ["cancel frame", () => {
        if (this.pendingFrame !== null) {
          this.frames.cancel(this.pendingFrame);
          this.pendingFrame = null;
        }
      }],
      ["unsubscribe input", () => {
        this.unsubscribeInput?.();
        this.unsubscribeInput = null;
      }],
      ["dispose input", () => this.input.dispose?.()],
      ["release audio", () => this.session.dispose()],
      ["detach renderer", () => this.renderer.detach?.()],
    ];

    let exitCode = code;
    for (const [name, step] of steps) {
      try {
        step();
      } catch (err) {
        this.logger.error(`[loop] Teardown step "${name}" failed:`, err);
        exitCode = 1;
      }
    }

    this.code = exitCode;
    this.logger.info(`[loop] Stopped with exit code ${exitCode}`);

    const listeners = this.exitListeners;
    this.exitListeners = [];
    for (const listener of listeners) {
      listener(exitCode);
    }
  }

  private scheduleNext(): void {
    this.pendingFrame = this.frames.request((now) => this.frame(now));
  }

  private frame(now: number): void {
    this.pendingFrame = null;
    if (this.currentState !== "running") return;

    if (this.origin === null) {
      this.origin = now;
    }
    const t: SessionMs = now - this.origin;

    try {
      if (this.limiter.shouldRun(now)) {
        this.session.tick(t);
        this.renderer.render(this.session.scene(t));
      }
    } catch (err) {
      this.logger.error("[loop] Frame failed:", err);
      this.stop(1);
      return;
    }

    // An exit event may have arrived while this frame ran
    if (this.currentState === "running") {
      this.scheduleNext();
    }
  }

  private handleInput(event: InputEvent): void {
    if (this.currentState !== "running") return;

    if (isExitEvent(event)) {
      this.stop(0);
      return;
    }

    if (event.type === "resize") {
      try {
        this.session.resize(event.width, event.height);
      } catch (err) {
        this.logger.warn("[loop] Ignoring resize:", err);
      }
    }
  }
}
