import type { Rect, TerminalSize } from "./types.js";

function nonNegativeInt(v: number): number {
  if (!Number.isFinite(v) || v <= 0) return 0;
  return Math.floor(v);
}

/** Build a frozen rect, clamping negative or fractional sizes. */
export function clampRect(x: number, y: number, w: number, h: number): Rect {
  return Object.freeze({
    x: Number.isFinite(x) ? Math.floor(x) : 0,
    y: Number.isFinite(y) ? Math.floor(y) : 0,
    w: nonNegativeInt(w),
    h: nonNegativeInt(h),
  });
}

export function rectArea(rect: Rect): number {
  return Math.max(0, rect.w) * Math.max(0, rect.h);
}

/** True when the two rects share at least one cell. Empty rects overlap nothing. */
export function rectsOverlap(a: Rect, b: Rect): boolean {
  if (rectArea(a) === 0 || rectArea(b) === 0) return false;
  return a.x < b.x + b.w && b.x < a.x + a.w && a.y < b.y + b.h && b.y < a.y + a.h;
}

/** True when every cell of `rect` lies inside `[0, cols) x [0, rows)`. */
export function rectWithin(rect: Rect, size: TerminalSize): boolean {
  return rect.x >= 0 && rect.y >= 0 && rect.x + rect.w <= size.cols && rect.y + rect.h <= size.rows;
}

export function rectContainsCell(rect: Rect, row: number, col: number): boolean {
  return col >= rect.x && col < rect.x + rect.w && row >= rect.y && row < rect.y + rect.h;
}
