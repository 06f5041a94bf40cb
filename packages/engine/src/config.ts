/**
 * Configuration: fixed constants for the screensaver.
 *
 * All magic numbers live here for visibility and testing.
 */

// --- Tempo ---

/** Grid cadence: one new cell per beat */
export const FILL_BPM = 120;

/** Frame-rate cap for the render loop */
export const TARGET_FPS = 60;

// --- Grid geometry ---

/** Gap between neighbouring cells (px) */
export const CELL_GAP_PX = 2;

/** Smallest target cell size before the grid is fitted to the display (px) */
export const MIN_TARGET_CELL_PX = 20;

/** Target cell size is the shorter display edge divided by this */
export const TARGET_CELLS_ACROSS = 30;

/** Lower bound for both columns and rows */
export const MIN_GRID_CELLS_PER_AXIS = 10;

/** Cells never shrink below this, even on a degenerate display (px) */
export const MIN_CELL_SIZE_PX = 1;

// --- Labels ---

/** Cells at or below this size get no label (px) */
export const LABEL_MIN_CELL_PX = 15;

/** Above this size the hex code is shown (px) */
export const HEX_LABEL_MIN_CELL_PX = 25;

/** Above this size the `R,G,B` triple is shown instead (px) */
export const RGB_LABEL_MIN_CELL_PX = 40;

/** Font sizes per label class (px) */
export const LABEL_FONT_PX = {
  large: 12,
  medium: 10,
} as const;

/** Brightness above which labels are drawn black instead of white */
export const LABEL_BRIGHTNESS_THRESHOLD = 128;

// --- Pitch mapping ---

export const MIN_NOTE = 36;
export const MAX_NOTE = 96;

/** Lowest note of each channel's 12-semitone band */
export const RED_BASE_NOTE = 36;
export const GREEN_BASE_NOTE = 48;
export const BLUE_BASE_NOTE = 60;
export const SEMITONES_PER_BAND = 12;

/** Fixed pitches for the structural background/foreground colors */
export const RESERVED_COLOR_NOTES: Readonly<Record<string, number>> = {
  "#000000": 36, // C2 - black
  "#0a0a0a": 38, // D2 - very dark gray
  "#1a1a1a": 40, // E2 - dark gray
  "#ffffff": 60, // C4 - white
};

// --- Tone synthesis ---

export const SAMPLE_RATE_HZ = 44100;

export const TONE_DURATION_S = 0.2;

/** Peak of a signed 16-bit sample */
export const MAX_SAMPLE = 2 ** 15 - 1;

/** Linear fade in/out window (s) */
export const FADE_WINDOW_S = 0.01;

/** Output gain applied after the envelope */
export const TONE_GAIN = 0.3;
