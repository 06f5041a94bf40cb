/**
 * Color primitives shared by the grid, the pitch mapper and the renderer.
 */

/** A single 8-bit channel value (0..255) */
export type Channel = number;

/** An RGB triple. Immutable once written into the grid. */
export type Rgb = readonly [r: Channel, g: Channel, b: Channel];

/** One grid position: a color, or null while the cell is still unset. */
export type Cell = Rgb | null;

/** Lowercase `#rrggbb` form, used as the lookup key for reserved colors */
export type HexColor = `#${string}`;

export const BLACK: Rgb = [0, 0, 0];
export const WHITE: Rgb = [255, 255, 255];

/** Fill used for cells that have not been written yet */
export const UNSET_CELL_FILL: Rgb = [10, 10, 10];

/** Border used for cells that have not been written yet */
export const UNSET_CELL_BORDER: Rgb = [26, 26, 26];

function channelHex(value: Channel): string {
  return value.toString(16).padStart(2, "0");
}

/**
 * Lowercase hex string for a color, e.g. `[255, 0, 10]` → `"#ff000a"`.
 */
export function rgbToHex([r, g, b]: Rgb): HexColor {
  return `#${channelHex(r)}${channelHex(g)}${channelHex(b)}`;
}

/** CSS `rgb(r, g, b)` string for canvas fill and stroke styles */
export function rgbToCss([r, g, b]: Rgb): string {
  return `rgb(${r}, ${g}, ${b})`;
}

/** Whole number in 0..255 */
export function isValidChannel(value: number): value is Channel {
  return Number.isInteger(value) && value >= 0 && value <= 255;
}
