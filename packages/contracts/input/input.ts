/**
 * Discrete input events consumed by the run loop.
 *
 * `quit`, `key` and `pointer` end the session; `resize` re-derives the grid.
 */
export type InputEvent =
  | { type: "quit" }
  | { type: "key"; key: string }
  | { type: "pointer" }
  | { type: "resize"; width: number; height: number };

export type InputEventType = InputEvent["type"];

/** Event types that terminate the run loop with a clean exit */
export const EXIT_EVENT_TYPES: readonly InputEventType[] = ["quit", "key", "pointer"];

export function isExitEvent(event: InputEvent): boolean {
  return EXIT_EVENT_TYPES.includes(event.type);
}
