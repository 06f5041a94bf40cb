/**
 * Grid Store
 *
 * Fixed-capacity, row-major sequence of cells with a write cursor.
 *
 * Until the grid is full each new color lands at the cursor. Once full,
 * the oldest cell (index 0) is discarded, every other cell moves one
 * place left and the new color lands in the last cell.
 */

import type { Cell, GridLayout, GridSnapshot, IRandomSource, Rgb } from "@tessera/contracts";
import { gridCapacity, isValidChannel } from "@tessera/contracts";
import { computeGridLayout } from "./gridLayout";
import { randomRgb } from "../random/RandomSource";

function assertLayout(layout: GridLayout): void {
  if (
    !Number.isInteger(layout.cols) ||
    !Number.isInteger(layout.rows) ||
    layout.cols < 1 ||
    layout.rows < 1
  ) {
    throw new RangeError(`Grid needs at least one row and column, got ${layout.cols}x${layout.rows}`);
  }
}

export class GridStore {
  private currentLayout: GridLayout;
  private data: Cell[];
  private writeCursor = 0;

  constructor(layout: GridLayout) {
    assertLayout(layout);
    this.currentLayout = layout;
    this.data = new Array<Cell>(gridCapacity(layout)).fill(null);
  }

  /**
   * Create an empty grid fitted to a display of the given pixel size.
   */
  static forDisplay(width: number, height: number): GridStore {
    return new GridStore(computeGridLayout(width, height));
  }

  get layout(): GridLayout {
    return this.currentLayout;
  }

  get capacity(): number {
    return this.data.length;
  }

  get cursor(): number {
    return this.writeCursor;
  }

  get isFull(): boolean {
    return this.writeCursor >= this.data.length;
  }

  /**
   * Re-fit the grid to a new display size.
   *
   * Cells keep their indices up to the smaller of the old and new capacity;
   * anything past the new capacity is dropped. The cursor is clamped to the
   * new capacity.
   */
  resize(width: number, height: number): GridLayout {
    return this.applyLayout(computeGridLayout(width, height));
  }

  /**
   * Switch to an explicit layout, preserving cells the same way as `resize`.
   */
  applyLayout(layout: GridLayout): GridLayout {
    assertLayout(layout);
    const capacity = gridCapacity(layout);
    this.currentLayout = layout;

    if (capacity !== this.data.length) {
      const previous = this.data;
      this.data = new Array<Cell>(capacity).fill(null);

      const kept = Math.min(previous.length, capacity);
      for (let i = 0; i < kept; i++) {
        this.data[i] = previous[i];
      }

      this.writeCursor = Math.min(this.writeCursor, capacity);
    }

    return layout;
  }

  /**
   * Write one random color and return it.
   */
  advance(rng: IRandomSource): Rgb {
    return this.push(randomRgb(rng));
  }

  /**
   * Write a color at the cursor, or evict-and-shift when full.
   * @throws RangeError when a channel is not a whole number in 0..255
   */
  push(rgb: Rgb): Rgb {
    if (rgb.some((channel) => !isValidChannel(channel))) {
      throw new RangeError(`Invalid color ${rgb.join(",")}: channels must be integers in 0..255`);
    }

    const capacity = this.data.length;

    if (this.writeCursor >= capacity) {
      this.data.copyWithin(0, 1);
      this.data[capacity - 1] = rgb;
    } else {
      this.data[this.writeCursor] = rgb;
      this.writeCursor++;
    }

    return rgb;
  }

  cellAt(index: number): Cell {
    if (!Number.isInteger(index) || index < 0 || index >= this.data.length) {
      throw new RangeError(`Cell index ${index} out of range 0..${this.data.length - 1}`);
    }
    return this.data[index];
  }

  /** All cells in row-major order */
  *cells(): IterableIterator<Cell> {
    yield* this.data;
  }

  snapshot(): GridSnapshot {
    return {
      layout: this.currentLayout,
      cells: this.data.slice(),
      cursor: this.writeCursor,
    };
  }
}
