/**
 * Tone Synthesizer
 *
 * Renders a sine wave into a stereo 16-bit PCM buffer with a short linear
 * fade at each end so playback starts and stops without clicks.
 */

import type { Hz, Seconds, SynthesizedTone } from "@tessera/contracts";
import {
  SAMPLE_RATE_HZ,
  TONE_DURATION_S,
  MAX_SAMPLE,
  FADE_WINDOW_S,
  TONE_GAIN,
} from "../config";

export class ToneSynthesisError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ToneSynthesisError";
  }
}

function assertPositive(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ToneSynthesisError(`${name} must be a positive finite number, got ${value}`);
  }
}

/**
 * Envelope multiplier for frame `i`: ramps 0→1 over the first fade window,
 * 1→0 over the last, and is 1 in between.
 *
 * Tones shorter than two fade windows fade over half their length each way
 * so the ramps meet at the midpoint instead of overlapping.
 */
export function envelopeAt(i: number, frameCount: number, sampleRate: Hz): number {
  const fadeFrames = Math.min(sampleRate * FADE_WINDOW_S, frameCount / 2);
  if (i < fadeFrames) {
    return i / fadeFrames;
  }
  if (i > frameCount - fadeFrames) {
    return (frameCount - i) / fadeFrames;
  }
  return 1;
}

/**
 * Synthesize a sine tone.
 *
 * @returns `round(duration * sampleRate)` frames, interleaved L/R with both
 *   channels identical
 * @throws ToneSynthesisError on a non-positive or non-finite argument
 */
export function synthesize(
  frequency: Hz,
  durationSeconds: Seconds = TONE_DURATION_S,
  sampleRate: Hz = SAMPLE_RATE_HZ
): SynthesizedTone {
  assertPositive("frequency", frequency);
  assertPositive("duration", durationSeconds);
  assertPositive("sample rate", sampleRate);

  const frameCount = Math.round(durationSeconds * sampleRate);
  const samples = new Int16Array(frameCount * 2);
  const phaseStep = (2 * Math.PI * frequency) / sampleRate;

  for (let i = 0; i < frameCount; i++) {
    const wave = Math.sin(phaseStep * i);
    const envelope = envelopeAt(i, frameCount, sampleRate);
    const sample = Math.trunc(wave * MAX_SAMPLE * envelope * TONE_GAIN);
    samples[2 * i] = sample;
    samples[2 * i + 1] = sample;
  }

  return {
    frequency,
    sampleRate,
    channels: 2,
    frameCount,
    durationSeconds,
    peakAmplitude: Math.trunc(MAX_SAMPLE * TONE_GAIN),
    samples,
  };
}
