/**
 * packages/core/src/frame/frameRenderer.ts — Region borders.
 *
 * Border drawing is best-effort: a glyph the surface rejects switches the
 * whole border to ASCII, and a second rejection leaves the border out. None
 * of this ever throws into content rendering.
 */

import { clampRect } from "../layout/geometry.js";
import type { Rect } from "../layout/types.js";
import type { TerminalSurface } from "../surface.js";
import { DEFAULT_STYLE, type Style } from "../text/style.js";
import {
  ASCII_FRAME_GLYPHS,
  DEFAULT_FRAME_STYLE,
  type FrameGlyphRole,
  type FrameGlyphSet,
  type FrameStyle,
  getFrameGlyphs,
} from "./glyphs.js";

/** Smallest rect (either side) a border is drawn for. */
export const MIN_FRAMED_SIDE = 3;

export type BorderCell = Readonly<{
  row: number;
  col: number;
  role: FrameGlyphRole;
  glyph: string;
}>;

/**
 * - primary: drawn with the requested glyphs
 * - ascii: primary failed, ASCII fallback drawn
 * - omitted: both failed; the border is incomplete or missing
 * - skipped: nothing to draw (rect too small)
 */
export type FrameDrawOutcome = "primary" | "ascii" | "omitted" | "skipped";

function cell(row: number, col: number, role: FrameGlyphRole, glyphs: FrameGlyphSet): BorderCell {
  return Object.freeze({ row, col, role, glyph: glyphs[role] });
}

/** Border cells for an explicit glyph set, row by row, left to right. */
export function borderWithGlyphs(rect: Rect, glyphs: FrameGlyphSet): BorderCell[] {
  if (rect.h < MIN_FRAMED_SIDE || rect.w < MIN_FRAMED_SIDE) return [];

  const x0 = rect.x;
  const y0 = rect.y;
  const x1 = rect.x + rect.w - 1;
  const y1 = rect.y + rect.h - 1;
  const out: BorderCell[] = [];

  out.push(cell(y0, x0, "topLeft", glyphs));
  for (let x = x0 + 1; x < x1; x++) out.push(cell(y0, x, "horizontal", glyphs));
  out.push(cell(y0, x1, "topRight", glyphs));

  for (let y = y0 + 1; y < y1; y++) {
    out.push(cell(y, x0, "vertical", glyphs));
    out.push(cell(y, x1, "vertical", glyphs));
  }

  out.push(cell(y1, x0, "bottomLeft", glyphs));
  for (let x = x0 + 1; x < x1; x++) out.push(cell(y1, x, "horizontal", glyphs));
  out.push(cell(y1, x1, "bottomRight", glyphs));

  return out;
}

/** Outline of `rect` in `style`; empty when either side is below 3 cells. */
export function border(rect: Rect, style: FrameStyle = DEFAULT_FRAME_STYLE): BorderCell[] {
  return borderWithGlyphs(rect, getFrameGlyphs(style));
}

/** Interior of a framed rect. */
export function contentArea(rect: Rect): Rect {
  return clampRect(rect.x + 1, rect.y + 1, rect.w - 2, rect.h - 2);
}

type PlacedGlyph = Readonly<{ row: number; col: number; role: FrameGlyphRole; style: Style }>;

/**
 * Incremental border writer for one frame.
 *
 * Cells are written with their own glyphs until the surface rejects one; then
 * every cell placed so far is redrawn in ASCII and the rest follow in ASCII.
 * A rejected ASCII glyph stops the border (`omitted`).
 */
export class BorderWriter {
  private state: "primary" | "ascii" | "omitted" = "primary";
  private readonly placed: PlacedGlyph[] = [];
  private writes = 0;
  private readonly surface: TerminalSurface;

  constructor(surface: TerminalSurface) {
    this.surface = surface;
  }

  get mode(): "primary" | "ascii" | "omitted" {
    return this.state;
  }

  /** Successful putChar calls, ASCII redraws included. */
  get cellsWritten(): number {
    return this.writes;
  }

  put(cell: BorderCell, style: Style): void {
    if (this.state === "omitted") return;
    const glyph: PlacedGlyph = Object.freeze({ row: cell.row, col: cell.col, role: cell.role, style });

    if (this.state === "primary") {
      if (this.write(cell.row, cell.col, cell.glyph, style)) {
        this.placed.push(glyph);
        return;
      }
      this.state = "ascii";
      for (const prev of [...this.placed, glyph]) {
        if (!this.write(prev.row, prev.col, ASCII_FRAME_GLYPHS[prev.role], prev.style)) {
          this.state = "omitted";
          return;
        }
      }
      this.placed.push(glyph);
      return;
    }

    if (this.write(cell.row, cell.col, ASCII_FRAME_GLYPHS[cell.role], style)) {
      this.placed.push(glyph);
    } else {
      this.state = "omitted";
    }
  }

  private write(row: number, col: number, glyph: string, style: Style): boolean {
    if (this.surface.putChar(row, col, glyph, style) !== "ok") return false;
    this.writes++;
    return true;
  }
}

/** Draw prepared border cells, falling back to ASCII on the first rejected glyph. */
export function drawBorderCells(
  surface: TerminalSurface,
  cells: readonly BorderCell[],
  style: Style = DEFAULT_STYLE,
): FrameDrawOutcome {
  if (cells.length === 0) return "skipped";
  const writer = new BorderWriter(surface);
  for (const c of cells) {
    writer.put(c, style);
    if (writer.mode === "omitted") break;
  }
  return writer.mode;
}

export function drawFrame(
  surface: TerminalSurface,
  rect: Rect,
  frameStyle: FrameStyle = DEFAULT_FRAME_STYLE,
  style: Style = DEFAULT_STYLE,
): FrameDrawOutcome {
  return drawBorderCells(surface, border(rect, frameStyle), style);
}
