/**
 * packages/core/src/layout/types.ts — Layout primitive type definitions.
 *
 * All coordinates are in terminal cell units: x is the column, y the row.
 */

/** Rectangle with position (x,y) and dimensions (w,h) in terminal cells. */
export type Rect = Readonly<{ x: number; y: number; w: number; h: number }>;

/** Terminal dimensions, rows first to match how terminals report them. */
export type TerminalSize = Readonly<{ rows: number; cols: number }>;

/** The four fixed regions of the screen. */
export type RegionId = "top" | "left" | "main" | "bottom";

/** Fixed region order used for redraw and draw-op emission. */
export const REGION_ORDER: readonly RegionId[] = Object.freeze(["top", "left", "main", "bottom"]);

/**
 * Computed geometry for one terminal size.
 *
 * Superseded wholesale on resize; never mutated.
 */
export type LayoutPlan = Readonly<{
  terminalRows: number;
  terminalCols: number;
  top: Rect;
  left: Rect;
  main: Rect;
  bottom: Rect;
}>;
