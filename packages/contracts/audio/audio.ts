import type { Hz, Seconds } from "../core/time";

/** MIDI-style pitch number. Notes produced by the pitch mapper stay in 36..96. */
export type MidiNote = number;

/** MIDI-style velocity, 1..127 */
export type Velocity = number;

/**
 * An immutable block of 16-bit PCM audio.
 *
 * Samples are interleaved by frame: `[L0, R0, L1, R1, ...]`. Tones are mono
 * material duplicated to both channels, so `L === R` for every frame.
 */
export interface SynthesizedTone {
  readonly frequency: Hz;
  readonly sampleRate: Hz;
  readonly channels: 2;
  readonly frameCount: number;
  readonly durationSeconds: Seconds;
  /** Largest absolute sample value the tone can reach */
  readonly peakAmplitude: number;
  readonly samples: Int16Array;
}

/**
 * What a single grid advance sounded like.
 */
export interface ToneEvent {
  /** Session time of the advance */
  t: number;
  note: MidiNote;
  /** Scientific pitch name, e.g. "E3" */
  noteName: string;
  frequency: Hz;
  velocity: Velocity;
}
