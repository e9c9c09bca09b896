/**
 * packages/node/src/tooSmallScreen.ts — Fallback screen for undersized terminals.
 *
 * Drawn with raw `putChar` writes: the layout engine and content buffers are
 * exactly what cannot run at this size, so nothing here depends on them.
 */

import { DEFAULT_STYLE, type TerminalSize, type TerminalSurface } from "@quadrant-tui/core";

export function tooSmallScreenLines(
  current: TerminalSize,
  minimum: TerminalSize,
): readonly string[] {
  return Object.freeze([
    "TERMINAL TOO SMALL",
    "",
    `Current size: ${current.cols} x ${current.rows}`,
    `Minimum required: ${minimum.cols} x ${minimum.rows}`,
    "",
    "Please resize your terminal window",
    "Press 'q' to quit or resize terminal",
  ]);
}

/**
 * Clear the surface and draw the message centred in the current size, then present.
 * Lines that do not fit are cut at the right edge or left out.
 */
export function drawTooSmallScreen(
  surface: TerminalSurface,
  current: TerminalSize,
  minimum: TerminalSize,
): void {
  const { rows, cols } = surface.size();
  surface.clearRegion({ x: 0, y: 0, w: cols, h: rows });

  const lines = tooSmallScreenLines(current, minimum);
  const top = Math.max(0, Math.floor(rows / 2) - Math.floor(lines.length / 2));
  lines.forEach((line, i) => {
    const row = top + i;
    if (row >= rows) return;
    const chars = Array.from(line).slice(0, cols);
    const left = Math.max(0, Math.floor((cols - chars.length) / 2));
    chars.forEach((ch, j) => {
      surface.putChar(row, left + j, ch, DEFAULT_STYLE);
    });
  });

  surface.present();
}
