import type { Ms } from "../core/time";
import type { Rgb } from "../color/color";
import type { Diagnostic } from "../diagnostics/diagnostics";

export interface Vec2 { x: number; y: number; }

/** Font size class for cell labels */
export type LabelSize = "large" | "medium";

export interface CellLabel {
  text: string;
  size: LabelSize;
  /** Center of the text in pixels */
  center: Vec2;
  color: Rgb;
}

/**
 * One grid cell as the renderer should draw it: a filled square with a
 * border and an optional centered label.
 */
export interface CellEntity {
  index: number;
  position: Vec2;
  size: number;
  fill: Rgb;
  border: Rgb;
  label?: CellLabel;
}

export interface SceneFrame {
  t: Ms;
  /** Full canvas background */
  background: Rgb;
  cells: CellEntity[];
  diagnostics: Diagnostic[];
}
