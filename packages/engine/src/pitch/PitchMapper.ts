/**
 * Pitch Mapper
 *
 * Turns a cell color into a note, and a note into a frequency.
 *
 * Reserved structural colors (black, the two unset-cell grays, white) have
 * fixed notes. Every other color is split into three 12-semitone bands,
 * red low, green middle, blue high, and the note is the mean of the three.
 */

import * as Tonal from "tonal";
import type { Hz, MidiNote, Rgb, Velocity } from "@tessera/contracts";
import { rgbToHex } from "@tessera/contracts";
import {
  RESERVED_COLOR_NOTES,
  RED_BASE_NOTE,
  GREEN_BASE_NOTE,
  BLUE_BASE_NOTE,
  SEMITONES_PER_BAND,
  MIN_NOTE,
  MAX_NOTE,
} from "../config";

/**
 * Offset of a channel within its band: `floor(channel / 255 * 12)`.
 * Computed in integers so values like 85 land on 4 rather than 3.999….
 * A full channel (255) reaches 12, one past the band.
 */
export function bandOffset(channel: number): number {
  return Math.floor((channel * SEMITONES_PER_BAND) / 255);
}

export function clampNote(note: number): MidiNote {
  return Math.max(MIN_NOTE, Math.min(MAX_NOTE, note));
}

/**
 * The fixed note for a reserved color, or null for any other color.
 */
export function reservedNoteFor(rgb: Rgb): MidiNote | null {
  return RESERVED_COLOR_NOTES[rgbToHex(rgb)] ?? null;
}

/**
 * Note for a cell color, always within [36, 96].
 *
 * The mean of three integers is never exactly halfway between two
 * integers, so the rounding mode cannot change the result.
 */
export function noteFor(rgb: Rgb): MidiNote {
  const reserved = reservedNoteFor(rgb);
  if (reserved !== null) return reserved;

  const [r, g, b] = rgb;
  const redNote = RED_BASE_NOTE + bandOffset(r);
  const greenNote = GREEN_BASE_NOTE + bandOffset(g);
  const blueNote = BLUE_BASE_NOTE + bandOffset(b);

  return clampNote(Math.round((redNote + greenNote + blueNote) / 3));
}

/**
 * Equal-tempered frequency with A4 (note 69) at 440 Hz.
 */
export function frequencyFor(note: MidiNote): Hz {
  return Tonal.Midi.midiToFreq(note);
}

/**
 * Loudness hint derived from the color's mean channel value, 1..127.
 * Carried with each tone event; tones are synthesized at a fixed gain.
 */
export function velocityFor([r, g, b]: Rgb): Velocity {
  return Math.max(1, Math.floor(((r + g + b) / 3 / 255) * 127));
}

/**
 * Scientific pitch name with sharps, e.g. 61 → "C#4".
 */
export function noteNameFor(note: MidiNote): string {
  return Tonal.Midi.midiToNoteName(note, { sharps: true });
}
