/**
 * Grid Scene Builder
 *
 * Turns a grid snapshot into the draw list for one frame: a square per
 * cell, unset cells in the dark background colors, set cells in their own
 * color, plus a centered label when the cells are big enough to read.
 */

import type {
  CellEntity,
  CellLabel,
  Diagnostic,
  GridSnapshot,
  Rgb,
  SceneFrame,
  SessionMs,
} from "@tessera/contracts";
import { BLACK, WHITE, UNSET_CELL_FILL, UNSET_CELL_BORDER, rgbToHex } from "@tessera/contracts";
import {
  LABEL_MIN_CELL_PX,
  HEX_LABEL_MIN_CELL_PX,
  RGB_LABEL_MIN_CELL_PX,
  LABEL_BRIGHTNESS_THRESHOLD,
} from "../config";

/**
 * Perceived brightness (ITU-R BT.601 weights), 0..255.
 */
export function brightnessOf([r, g, b]: Rgb): number {
  return (r * 299 + g * 587 + b * 114) / 1000;
}

/** Black text on bright colors, white text on dark ones */
export function textColorFor(rgb: Rgb): Rgb {
  return brightnessOf(rgb) > LABEL_BRIGHTNESS_THRESHOLD ? BLACK : WHITE;
}

/**
 * Label text for a cell of the given size, or null when the cell is too
 * small to carry one.
 */
export function labelTextFor(rgb: Rgb, cellSize: number): Pick<CellLabel, "text" | "size"> | null {
  if (cellSize <= LABEL_MIN_CELL_PX) return null;

  if (cellSize > RGB_LABEL_MIN_CELL_PX) {
    return { text: `${rgb[0]},${rgb[1]},${rgb[2]}`, size: "large" };
  }
  if (cellSize > HEX_LABEL_MIN_CELL_PX) {
    return { text: rgbToHex(rgb).toUpperCase(), size: "medium" };
  }
  return null;
}

export function buildGridScene(
  snapshot: GridSnapshot,
  t: SessionMs,
  diagnostics: Diagnostic[] = []
): SceneFrame {
  const { cols, cellSize, gap } = snapshot.layout;
  const pitch = cellSize + gap;
  const half = Math.floor(cellSize / 2);

  const cells: CellEntity[] = snapshot.cells.map((cell, index) => {
    const row = Math.floor(index / cols);
    const col = index % cols;
    const position = { x: col * pitch, y: row * pitch };

    if (cell === null) {
      return {
        index,
        position,
        size: cellSize,
        fill: UNSET_CELL_FILL,
        border: UNSET_CELL_BORDER,
      };
    }

    const entity: CellEntity = {
      index,
      position,
      size: cellSize,
      fill: cell,
      border: cell,
    };

    const label = labelTextFor(cell, cellSize);
    if (label) {
      entity.label = {
        ...label,
        center: { x: position.x + half, y: position.y + half },
        color: textColorFor(cell),
      };
    }

    return entity;
  });

  return { t, background: BLACK, cells, diagnostics };
}
