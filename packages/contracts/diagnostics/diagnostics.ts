import type { SessionMs } from "../core/time";

/**
 * Diagnostic categories for grouping.
 */
export type DiagnosticCategory = "audio";

/**
 * Diagnostic severity levels.
 */
export type DiagnosticSeverity = "warning";

/**
 * A runtime diagnostic emitted when something goes wrong but the system
 * can continue operating (for example a tone that failed to play).
 *
 * A diagnostic rides on the next scene frame only and is then dropped.
 */
export interface Diagnostic {
  /** Unique identifier for deduplication */
  id: string;

  /** Category for grouping and visual indication */
  category: DiagnosticCategory;

  /** Severity level */
  severity: DiagnosticSeverity;

  /** Human-readable message */
  message: string;

  /** When the diagnostic was emitted */
  timestamp: SessionMs;

  /** Optional: which component emitted this */
  source?: string;
}

/**
 * Minimal logging surface. `console` satisfies it; tests pass a spy.
 */
export type Logger = Pick<Console, "info" | "warn" | "error">;
