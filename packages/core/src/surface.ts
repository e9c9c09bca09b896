/**
 * Terminal surface contract consumed by the rendering core.
 *
 * The core never talks to a terminal directly: it emits draw operations and an
 * adapter applies them to a surface. The Node package ships an ANSI
 * implementation; tests use the in-memory surface from `testing/`.
 */

import type { Rect, TerminalSize } from "./layout/types.js";
import type { Style } from "./text/style.js";

/**
 * Per-cell write outcome.
 *
 * "failure" is recoverable: it only means this glyph could not be placed
 * (out of bounds, or not representable on this terminal). The frame renderer
 * uses it as the signal to fall back to ASCII borders.
 */
export type PutCharResult = "ok" | "failure";

export interface TerminalSurface {
  /** Current terminal size. */
  size(): TerminalSize;

  /** Write a single glyph with a style at (row, col). */
  putChar(row: number, col: number, glyph: string, style: Style): PutCharResult;

  /** Blank every cell of `rect`. */
  clearRegion(rect: Rect): void;

  /** Flush buffered writes to the physical terminal. */
  present(): void;
}
