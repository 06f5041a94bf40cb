/**
 * Screensaver Session
 *
 * The single context object for a running screensaver. Owns the grid, the
 * fill cadence and the random source, and holds the audio sink it plays
 * through. Everything mutable lives here rather than in module globals so
 * each part can be driven directly from tests.
 *
 * Per beat: grid.advance → noteFor → frequencyFor → synthesize → sink.replace
 */

import type {
  Diagnostic,
  GridLayout,
  IAudioSink,
  IRandomSource,
  Logger,
  Rgb,
  SceneFrame,
  SessionMs,
  ToneEvent,
} from "@tessera/contracts";
import { rgbToHex } from "@tessera/contracts";
import { GridStore } from "./grid/GridStore";
import { FillScheduler } from "./scheduler/FillScheduler";
import { MathRandomSource } from "./random/RandomSource";
import { noteFor, frequencyFor, velocityFor, noteNameFor } from "./pitch/PitchMapper";
import { synthesize } from "./synthesis/ToneSynthesizer";
import { buildGridScene } from "./presentation/GridSceneBuilder";
import { FILL_BPM, SAMPLE_RATE_HZ, TONE_DURATION_S } from "./config";

/**
 * Configuration for a session.
 */
export interface ScreensaverSessionConfig {
  /** Display size the grid is fitted to */
  displaySize: { width: number; height: number };

  /** Where tones are played */
  audio: IAudioSink;

  /** Random source for new cell colors (defaults to Math.random) */
  rng?: IRandomSource;

  /** Fill cadence in beats per minute */
  bpm?: number;

  /** Tone length in seconds */
  toneDurationS?: number;

  sampleRate?: number;

  logger?: Logger;
}

/**
 * Result of one grid advance.
 */
export interface AdvanceResult {
  color: Rgb;
  /** Null when the tone could not be synthesized or played */
  tone: ToneEvent | null;
}

export class ScreensaverSession {
  readonly grid: GridStore;
  readonly scheduler: FillScheduler;

  private audio: IAudioSink;
  private rng: IRandomSource;
  private logger: Logger;
  private toneDurationS: number;
  private sampleRate: number;

  private pendingDiagnostics: Diagnostic[] = [];
  private lastTone: ToneEvent | null = null;
  private diagnosticCounter = 0;

  constructor(config: ScreensaverSessionConfig) {
    this.grid = GridStore.forDisplay(config.displaySize.width, config.displaySize.height);
    this.scheduler = new FillScheduler({ bpm: config.bpm ?? FILL_BPM });
    this.audio = config.audio;
    this.rng = config.rng ?? new MathRandomSource();
    this.logger = config.logger ?? console;
    this.toneDurationS = config.toneDurationS ?? TONE_DURATION_S;
    this.sampleRate = config.sampleRate ?? SAMPLE_RATE_HZ;
  }

  /** The tone played by the most recent advance, if it played */
  get currentTone(): ToneEvent | null {
    return this.lastTone;
  }

  /**
   * Advance the session clock. Adds a cell when a beat has elapsed.
   * @returns whether a cell was added
   */
  tick(t: SessionMs): boolean {
    return this.scheduler.tick(t, (now) => {
      this.advanceCell(now);
    });
  }

  /**
   * Add one random cell and play its tone.
   *
   * A tone failure never undoes the cell: it is logged, recorded as a
   * diagnostic and the cell stays silent.
   */
  advanceCell(t: SessionMs): AdvanceResult {
    const color = this.grid.advance(this.rng);
    const note = noteFor(color);
    const frequency = frequencyFor(note);

    const event: ToneEvent = {
      t,
      note,
      noteName: noteNameFor(note),
      frequency,
      velocity: velocityFor(color),
    };

    try {
      const tone = synthesize(frequency, this.toneDurationS, this.sampleRate);
      this.audio.replace(tone);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`[session] Tone for ${rgbToHex(color)} (${event.noteName}) failed:`, err);
      this.report({
        id: `session-tone-${this.diagnosticCounter++}`,
        category: "audio",
        severity: "warning",
        message: `Tone for ${rgbToHex(color)} failed: ${message}`,
        timestamp: t,
        source: "session",
      });
      this.lastTone = null;
      return { color, tone: null };
    }

    this.lastTone = event;
    return { color, tone: event };
  }

  /**
   * Re-fit the grid to a new display size, keeping existing cells.
   */
  resize(width: number, height: number): GridLayout {
    const previous = this.grid.capacity;
    const layout = this.grid.resize(width, height);
    if (this.grid.capacity !== previous) {
      this.logger.info(
        `[session] Grid resized to ${layout.cols}x${layout.rows} (${previous} → ${this.grid.capacity} cells)`
      );
    }
    return layout;
  }

  /**
   * Scene for the current grid state. Diagnostics raised since the last
   * scene are attached once and then cleared.
   */
  scene(t: SessionMs): SceneFrame {
    const diagnostics = this.pendingDiagnostics;
    this.pendingDiagnostics = [];
    return buildGridScene(this.grid.snapshot(), t, diagnostics);
  }

  /**
   * Stop any tone and release the audio sink.
   */
  dispose(): void {
    this.audio.dispose();
    this.lastTone = null;
  }

  private report(diagnostic: Diagnostic): void {
    this.pendingDiagnostics.push(diagnostic);
  }
}
