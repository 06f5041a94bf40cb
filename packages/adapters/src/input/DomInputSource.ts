import type { IInputSource, InputEvent } from "@tessera/contracts";

/**
 * The slice of `window` the input source listens on.
 * Allows testing without a DOM.
 */
export interface InputTarget {
  addEventListener(type: string, listener: (event: Event) => void): void;
  removeEventListener(type: string, listener: (event: Event) => void): void;
  readonly innerWidth: number;
  readonly innerHeight: number;
}

/**
 * DOM implementation of IInputSource.
 *
 * keydown → key, pointerdown → pointer, resize → resize (viewport size),
 * pagehide → quit.
 */
export class DomInputSource implements IInputSource {
  private listeners: Array<(event: InputEvent) => void> = [];
  private domHandlers: Array<[string, (event: Event) => void]> = [];

  constructor(private target: InputTarget) {
    this.listen("keydown", (event) => {
      const key = "key" in event && typeof event.key === "string" ? event.key : "";
      this.emit({ type: "key", key });
    });
    this.listen("pointerdown", () => this.emit({ type: "pointer" }));
    this.listen("resize", () =>
      this.emit({ type: "resize", width: this.target.innerWidth, height: this.target.innerHeight })
    );
    this.listen("pagehide", () => this.emit({ type: "quit" }));
  }

  onEvent(callback: (event: InputEvent) => void): () => void {
    this.listeners.push(callback);
    return () => {
      const idx = this.listeners.indexOf(callback);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }

  dispose(): void {
    for (const [type, handler] of this.domHandlers) {
      this.target.removeEventListener(type, handler);
    }
    this.domHandlers = [];
    this.listeners = [];
  }

  private listen(type: string, handler: (event: Event) => void): void {
    this.target.addEventListener(type, handler);
    this.domHandlers.push([type, handler]);
  }

  private emit(event: InputEvent): void {
    // Copy: a listener may unsubscribe while we iterate
    for (const listener of [...this.listeners]) {
      listener(event);
    }
  }
}
