// Session and loop
export {
  ScreensaverSession,
  type ScreensaverSessionConfig,
  type AdvanceResult,
} from "./ScreensaverSession";
export {
  ScreensaverLoop,
  type ScreensaverLoopConfig,
  type ExitCode,
  type LoopState,
} from "./ScreensaverLoop";

// Grid
export { GridStore } from "./grid/GridStore";
export { computeGridLayout } from "./grid/gridLayout";

// Timing
export {
  FillScheduler,
  bpmToIntervalMs,
  type FillSchedulerConfig,
  type FillSchedulerState,
} from "./scheduler/FillScheduler";
export { FrameLimiter } from "./scheduler/FrameLimiter";

// Pitch and tone
export {
  noteFor,
  frequencyFor,
  velocityFor,
  noteNameFor,
  reservedNoteFor,
  bandOffset,
  clampNote,
} from "./pitch/PitchMapper";
export { synthesize, envelopeAt, ToneSynthesisError } from "./synthesis/ToneSynthesizer";

// Randomness
export { MathRandomSource, SeededRandom, randomInt, randomRgb } from "./random/RandomSource";

// Presentation
export {
  buildGridScene,
  brightnessOf,
  textColorFor,
  labelTextFor,
} from "./presentation/GridSceneBuilder";

// Renderers
export * from "./renderers";

// Configuration
export * from "./config";
