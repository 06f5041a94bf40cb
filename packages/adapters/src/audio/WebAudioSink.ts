import type { IAudioSink, Logger, SynthesizedTone } from "@tessera/contracts";

/**
 * Thrown when the audio device cannot be opened. Tones are a core feature,
 * so callers treat this as fatal at startup.
 */
export class AudioInitError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AudioInitError";
  }
}

/**
 * The slice of the Web Audio API the sink uses.
 * Allows testing the sink without browser APIs.
 */
export type AudioContextLike = Pick<
  AudioContext,
  "createBuffer" | "createBufferSource" | "createGain" | "destination" | "state" | "resume" | "close"
>;

export interface WebAudioSinkConfig {
  /**
   * Creates the audio context. Defaults to `new AudioContext()`.
   */
  contextFactory?: () => AudioContextLike;

  /**
   * Master output gain (0..1).
   * @default 1
   */
  gain?: number;

  logger?: Logger;
}

/** Full-scale value used to convert int16 samples to floats */
const INT16_SCALE = 32768;

function defaultContextFactory(): AudioContextLike {
  if (typeof AudioContext === "undefined") {
    throw new AudioInitError("Web Audio API not supported in this browser");
  }
  return new AudioContext();
}

/**
 * Web Audio implementation of IAudioSink.
 * For use in browser environments.
 *
 * Plays one tone at a time: `replace` stops the buffer source that is
 * still sounding before starting the new one.
 */
export class WebAudioSink implements IAudioSink {
  private ctx: AudioContextLike | null = null;
  private output: GainNode | null = null;
  private current: AudioBufferSourceNode | null = null;
  private opening: Promise<void> | null = null;
  private contextFactory: () => AudioContextLike;
  private gain: number;
  private logger: Logger;

  constructor(config: WebAudioSinkConfig = {}) {
    this.contextFactory = config.contextFactory ?? defaultContextFactory;
    this.gain = config.gain ?? 1;
    this.logger = config.logger ?? console;
  }

  get isReady(): boolean {
    return this.ctx !== null;
  }

  /**
   * Open the audio context.
   * Must be called before using other methods, ideally from a user
   * gesture so the browser lets playback start. Calls made while the
   * context is still opening share the same attempt.
   * @throws AudioInitError when no context can be created or resumed
   */
  init(): Promise<void> {
    if (this.ctx) return Promise.resolve();

    if (!this.opening) {
      this.opening = this.open().finally(() => {
        this.opening = null;
      });
    }
    return this.opening;
  }

  private async open(): Promise<void> {
    let ctx: AudioContextLike;
    try {
      ctx = this.contextFactory();
    } catch (err) {
      if (err instanceof AudioInitError) throw err;
      throw new AudioInitError("Failed to create audio context", { cause: err });
    }

    try {
      if (ctx.state === "suspended") {
        await ctx.resume();
      }
    } catch (err) {
      this.closeContext(ctx);
      throw new AudioInitError("Failed to start audio context", { cause: err });
    }

    const output = ctx.createGain();
    output.gain.value = this.gain;
    output.connect(ctx.destination);

    this.ctx = ctx;
    this.output = output;
  }

  replace(tone: SynthesizedTone): void {
    if (!this.ctx || !this.output) {
      throw new Error("WebAudioSink not initialized");
    }

    this.stop();

    const buffer = this.ctx.createBuffer(tone.channels, tone.frameCount, tone.sampleRate);
    for (let channel = 0; channel < tone.channels; channel++) {
      const data = buffer.getChannelData(channel);
      for (let i = 0; i < tone.frameCount; i++) {
        data[i] = tone.samples[i * tone.channels + channel] / INT16_SCALE;
      }
    }

    const source = this.ctx.createBufferSource();
    source.buffer = buffer;
    source.connect(this.output);
    source.onended = () => {
      if (this.current === source) {
        this.current = null;
      }
      source.disconnect();
    };
    source.start();
    this.current = source;
  }

  stop(): void {
    const source = this.current;
    if (!source) return;

    this.current = null;
    source.onended = null;
    source.stop();
    source.disconnect();
  }

  dispose(): void {
    const ctx = this.ctx;
    try {
      this.stop();
    } finally {
      this.output?.disconnect();
      this.output = null;
      this.ctx = null;
      if (ctx) {
        this.closeContext(ctx);
      }
    }
  }

  private closeContext(ctx: AudioContextLike): void {
    ctx.close().catch((err: unknown) => {
      this.logger.warn("[audio] Failed to close audio context:", err);
    });
  }
}
