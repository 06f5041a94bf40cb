import type { IRenderer, SceneFrame, CellEntity, CellLabel } from "@tessera/contracts";
import { rgbToCss } from "@tessera/contracts";
import { LABEL_FONT_PX } from "../config";

export interface Canvas2DRendererConfig {
  /** Whether to clear canvas each frame */
  clearEachFrame?: boolean;
  /** CSS font family for cell labels */
  fontFamily?: string;
}

const DEFAULT_CONFIG: Required<Canvas2DRendererConfig> = {
  clearEachFrame: true,
  fontFamily: "monospace",
};

/**
 * Canvas2D renderer for grid scenes.
 * Implements IRenderer interface.
 *
 * Each cell is a filled square with a 1px border of the given color and,
 * when the scene provides one, a label centered on the cell.
 */
export class Canvas2DRenderer implements IRenderer {
  readonly id = "canvas2d";

  private ctx: CanvasRenderingContext2D | null = null;
  private canvas: HTMLCanvasElement | null = null;
  private config: Required<Canvas2DRendererConfig>;

  constructor(config: Canvas2DRendererConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Attach to a canvas element.
   * Must be called before render().
   */
  attach(canvas: HTMLCanvasElement): void {
    this.canvas = canvas;
    this.ctx = canvas.getContext("2d");
    if (!this.ctx) {
      throw new Error("Failed to get 2D rendering context");
    }
  }

  /**
   * Detach from canvas.
   */
  detach(): void {
    this.ctx = null;
    this.canvas = null;
  }

  /**
   * Render a scene frame to the attached canvas.
   */
  render(scene: SceneFrame): void {
    if (!this.ctx || !this.canvas) {
      return;
    }

    const { width, height } = this.canvas;

    if (this.config.clearEachFrame) {
      this.ctx.fillStyle = rgbToCss(scene.background);
      this.ctx.fillRect(0, 0, width, height);
    }

    for (const cell of scene.cells) {
      this.drawCell(cell);
    }
  }

  private drawCell(cell: CellEntity): void {
    if (!this.ctx) return;

    const { x, y } = cell.position;

    this.ctx.fillStyle = rgbToCss(cell.fill);
    this.ctx.fillRect(x, y, cell.size, cell.size);

    this.ctx.strokeStyle = rgbToCss(cell.border);
    this.ctx.lineWidth = 1;
    // Inset by half a pixel so the 1px border stays inside the cell
    this.ctx.strokeRect(x + 0.5, y + 0.5, cell.size - 1, cell.size - 1);

    if (cell.label) {
      this.drawLabel(cell.label);
    }
  }

  private drawLabel(label: CellLabel): void {
    if (!this.ctx) return;

    this.ctx.font = `${LABEL_FONT_PX[label.size]}px ${this.config.fontFamily}`;
    this.ctx.textAlign = "center";
    this.ctx.textBaseline = "middle";
    this.ctx.fillStyle = rgbToCss(label.color);
    this.ctx.fillText(label.text, label.center.x, label.center.y);
  }
}
