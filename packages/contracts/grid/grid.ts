import type { Cell } from "../color/color";

/**
 * Grid geometry derived from the display size.
 * Cells are square; `gap` pixels separate neighbouring cells.
 */
export interface GridLayout {
  cols: number;
  rows: number;
  /** Edge length of one cell in pixels (may be fractional) */
  cellSize: number;
  gap: number;
}

/**
 * Read-only view of the grid handed to the presentation layer.
 * `cells` is in row-major order and always has `cols * rows` entries.
 */
export interface GridSnapshot {
  layout: GridLayout;
  cells: readonly Cell[];
  /** Index of the next empty cell, or capacity once the grid is full */
  cursor: number;
}

export function gridCapacity(layout: GridLayout): number {
  return layout.cols * layout.rows;
}
