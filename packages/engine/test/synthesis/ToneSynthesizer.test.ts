import { describe, it, expect } from "vitest";
import { synthesize, envelopeAt, ToneSynthesisError } from "../../src/synthesis/ToneSynthesizer";

const SAMPLE_RATE = 44100;
const FADE_FRAMES = 441; // 0.01s at 44.1kHz

describe("ToneSynthesizer", () => {
  describe("buffer shape", () => {
    it("produces round(duration * sampleRate) frames", () => {
      const tone = synthesize(440, 0.2, SAMPLE_RATE);
      expect(tone.frameCount).toBe(8820);
      expect(tone.samples).toHaveLength(8820 * 2);
      expect(tone.channels).toBe(2);
    });

    it("rounds fractional frame counts", () => {
      expect(synthesize(440, 0.10006, 8000).frameCount).toBe(800);
      expect(synthesize(440, 0.10007, 8000).frameCount).toBe(801);
    });

    it("uses 0.2s at 44.1kHz by default", () => {
      const tone = synthesize(440);
      expect(tone.durationSeconds).toBe(0.2);
      expect(tone.sampleRate).toBe(44100);
      expect(tone.frameCount).toBe(8820);
    });

    it("records the frequency and peak amplitude", () => {
      const tone = synthesize(261.5);
      expect(tone.frequency).toBe(261.5);
      // 32767 * 0.3 = 9830.1
      expect(tone.peakAmplitude).toBe(9830);
    });
  });

  describe("samples", () => {
    const tone = synthesize(440, 0.2, SAMPLE_RATE);

    it("writes identical left and right channels", () => {
      for (let i = 0; i < tone.frameCount; i++) {
        expect(tone.samples[2 * i + 1]).toBe(tone.samples[2 * i]);
      }
    });

    it("starts silent", () => {
      expect(tone.samples[0]).toBe(0);
    });

    it("stays within the gain-limited peak", () => {
      let max = 0;
      for (const sample of tone.samples) {
        max = Math.max(max, Math.abs(sample));
      }
      expect(max).toBeLessThanOrEqual(tone.peakAmplitude);
      // 440Hz reaches its crest well inside the steady section
      expect(max).toBeGreaterThan(9800);
    });

    it("is a full-gain sine in the steady section", () => {
      const i = 1000;
      const wave = Math.sin(((2 * Math.PI * 440) / SAMPLE_RATE) * i);
      expect(tone.samples[2 * i]).toBe(Math.trunc(wave * 32767 * 0.3));
    });

    it("scales fade-in samples by the envelope", () => {
      const i = 200;
      const wave = Math.sin(((2 * Math.PI * 440) / SAMPLE_RATE) * i);
      expect(tone.samples[2 * i]).toBe(Math.trunc(wave * 32767 * (i / FADE_FRAMES) * 0.3));
    });

    it("never exceeds the un-enveloped waveform inside the fades", () => {
      const fadeIndices = [
        ...Array.from({ length: FADE_FRAMES }, (_, i) => i),
        ...Array.from({ length: FADE_FRAMES }, (_, i) => tone.frameCount - 1 - i),
      ];
      for (const i of fadeIndices) {
        const raw = Math.trunc(Math.sin(((2 * Math.PI * 440) / SAMPLE_RATE) * i) * 32767 * 0.3);
        expect(Math.abs(tone.samples[2 * i])).toBeLessThanOrEqual(Math.abs(raw));
      }
    });
  });

  describe("envelopeAt", () => {
    const frames = 8820;

    it("ramps up linearly over the first 10ms", () => {
      expect(envelopeAt(0, frames, SAMPLE_RATE)).toBe(0);
      expect(envelopeAt(220.5, frames, SAMPLE_RATE)).toBe(0.5);
      for (let i = 1; i < FADE_FRAMES; i++) {
        expect(envelopeAt(i, frames, SAMPLE_RATE)).toBeGreaterThan(envelopeAt(i - 1, frames, SAMPLE_RATE));
      }
    });

    it("holds at 1 between the fades", () => {
      expect(envelopeAt(FADE_FRAMES, frames, SAMPLE_RATE)).toBe(1);
      expect(envelopeAt(4000, frames, SAMPLE_RATE)).toBe(1);
      expect(envelopeAt(frames - FADE_FRAMES, frames, SAMPLE_RATE)).toBe(1);
    });

    it("ramps down linearly over the last 10ms", () => {
      expect(envelopeAt(frames - FADE_FRAMES + 1, frames, SAMPLE_RATE)).toBeCloseTo(440 / 441, 12);
      expect(envelopeAt(frames - 1, frames, SAMPLE_RATE)).toBeCloseTo(1 / 441, 12);
      for (let i = frames - FADE_FRAMES + 2; i < frames; i++) {
        expect(envelopeAt(i, frames, SAMPLE_RATE)).toBeLessThan(envelopeAt(i - 1, frames, SAMPLE_RATE));
      }
    });
  });

  describe("short tones", () => {
    // 0.015s at 44.1kHz: shorter than the two 10ms fades together
    const frames = 662;

    it("fades over half the tone each way", () => {
      expect(envelopeAt(0, frames, SAMPLE_RATE)).toBe(0);
      expect(envelopeAt(165.5, frames, SAMPLE_RATE)).toBe(0.5);
      expect(envelopeAt(331, frames, SAMPLE_RATE)).toBe(1);
      expect(envelopeAt(440, frames, SAMPLE_RATE)).toBeCloseTo(222 / 331, 12);
    });

    it("changes by at most one fade step between frames", () => {
      for (let i = 1; i < frames; i++) {
        const step = Math.abs(envelopeAt(i, frames, SAMPLE_RATE) - envelopeAt(i - 1, frames, SAMPLE_RATE));
        expect(step).toBeLessThanOrEqual(1 / 331 + 1e-12);
      }
    });

    it("keeps the full fade window for default-length tones", () => {
      expect(envelopeAt(220.5, 8820, SAMPLE_RATE)).toBe(0.5);
    });
  });

  describe("invalid input", () => {
    it("rejects non-positive frequencies", () => {
      expect(() => synthesize(0)).toThrow(ToneSynthesisError);
      expect(() => synthesize(-440)).toThrow(ToneSynthesisError);
    });

    it("rejects non-finite values", () => {
      expect(() => synthesize(Number.NaN)).toThrow(ToneSynthesisError);
      expect(() => synthesize(440, Number.POSITIVE_INFINITY)).toThrow(ToneSynthesisError);
    });

    it("rejects a zero sample rate", () => {
      expect(() => synthesize(440, 0.2, 0)).toThrow("sample rate must be a positive finite number, got 0");
    });
  });

  it("is deterministic", () => {
    const a = synthesize(329.63, 0.05, 22050);
    const b = synthesize(329.63, 0.05, 22050);
    expect(Array.from(a.samples)).toEqual(Array.from(b.samples));
  });
});
