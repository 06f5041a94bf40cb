import { describe, it, expect } from "vitest";
import { computeGridLayout } from "../../src/grid/gridLayout";

describe("computeGridLayout", () => {
  it("fits a 1080p display", () => {
    // target = 1080 / 30 = 36px → floor(1922 / 38) = 50 cols, floor(1082 / 38) = 28 rows
    const layout = computeGridLayout(1920, 1080);
    expect(layout.cols).toBe(50);
    expect(layout.rows).toBe(28);
    expect(layout.gap).toBe(2);
    // min((1920 - 98) / 50, (1080 - 54) / 28) = min(36.44, 36.64)
    expect(layout.cellSize).toBeCloseTo(36.44, 10);
  });

  it("uses the 20px minimum target on small displays", () => {
    // 600 / 30 = 20 → floor(802 / 22) = 36, floor(602 / 22) = 27
    const layout = computeGridLayout(800, 600);
    expect(layout.cols).toBe(36);
    expect(layout.rows).toBe(27);
    expect(layout.cellSize).toBeCloseTo(730 / 36, 10);
  });

  it("keeps cells square by taking the tighter axis", () => {
    const layout = computeGridLayout(1000, 400);
    // target 20 → floor(1002 / 22) = 45 cols, floor(402 / 22) = 18 rows
    expect(layout.cols).toBe(45);
    expect(layout.rows).toBe(18);
    const cellWidth = (1000 - 44 * 2) / 45;
    const cellHeight = (400 - 17 * 2) / 18;
    expect(layout.cellSize).toBe(Math.min(cellWidth, cellHeight));
  });

  it("enforces at least 10 columns and rows", () => {
    const layout = computeGridLayout(100, 100);
    expect(layout.cols).toBe(10);
    expect(layout.rows).toBe(10);
    // (100 - 18) / 10
    expect(layout.cellSize).toBeCloseTo(8.2, 10);
  });

  it("clamps degenerate dimensions to a 10x10 grid of 1px cells", () => {
    expect(computeGridLayout(0, 0)).toEqual({ cols: 10, rows: 10, cellSize: 1, gap: 2 });
    expect(computeGridLayout(-50, -50)).toEqual({ cols: 10, rows: 10, cellSize: 1, gap: 2 });
  });

  it("clamps a single degenerate axis", () => {
    const layout = computeGridLayout(-50, 300);
    expect(layout.cols).toBe(10);
    // floor(302 / 22) = 13
    expect(layout.rows).toBe(13);
    expect(layout.cellSize).toBe(1);
  });

  it("rejects non-finite dimensions", () => {
    expect(() => computeGridLayout(Number.NaN, 100)).toThrow(RangeError);
    expect(() => computeGridLayout(100, Number.POSITIVE_INFINITY)).toThrow(RangeError);
  });
});
