import type { GridLayout } from "@tessera/contracts";
import {
  CELL_GAP_PX,
  MIN_TARGET_CELL_PX,
  TARGET_CELLS_ACROSS,
  MIN_GRID_CELLS_PER_AXIS,
  MIN_CELL_SIZE_PX,
} from "../config";

/**
 * Fit a grid of square cells to a display.
 *
 * Picks a target cell size from the shorter edge, counts how many cells of
 * that size fit along each axis (at least 10), then stretches the cell size
 * so the grid fills whichever axis is tighter.
 *
 * Zero or negative dimensions are treated as 0 and still produce a 10x10
 * grid; non-finite dimensions are rejected.
 */
export function computeGridLayout(width: number, height: number): GridLayout {
  if (!Number.isFinite(width) || !Number.isFinite(height)) {
    throw new RangeError(`Display size must be finite, got ${width}x${height}`);
  }

  const w = Math.max(0, width);
  const h = Math.max(0, height);
  const gap = CELL_GAP_PX;

  const targetCellSize = Math.max(MIN_TARGET_CELL_PX, Math.min(w, h) / TARGET_CELLS_ACROSS);

  const cols = Math.max(MIN_GRID_CELLS_PER_AXIS, Math.floor((w + gap) / (targetCellSize + gap)));
  const rows = Math.max(MIN_GRID_CELLS_PER_AXIS, Math.floor((h + gap) / (targetCellSize + gap)));

  const cellWidth = (w - (cols - 1) * gap) / cols;
  const cellHeight = (h - (rows - 1) * gap) / rows;
  const cellSize = Math.max(MIN_CELL_SIZE_PX, Math.min(cellWidth, cellHeight));

  return { cols, rows, cellSize, gap };
}
