/**
 * packages/core/src/text/wrap.ts — Styled-run word wrap.
 *
 * Invariants (both modes):
 *   - every produced line is at most `width` cells wide
 *   - concatenating every run of every line yields the input text minus `\n`
 *   - each `\n` starts a new line, so blank lines survive, trailing ones included
 *
 * Run boundaries are kept: a run is only ever sliced, never merged with its
 * neighbours, so styles stay attached to the exact text they were given with.
 */

import { measureTextCells, splitAtCells, splitCells } from "../layout/textMeasure.js";
import { DEFAULT_STYLE, type Style, type StyledLine, type StyledRun, styledRun } from "./style.js";

/**
 * - "char": overflowing runs are cut exactly at the line width
 * - "word": the cut moves back to just after the last space or hyphen in the
 *   chunk, degrading to a hard cut when the chunk has neither
 */
export type WrapMode = "char" | "word";

export type WrapOptions = Readonly<{ mode?: WrapMode }>;

function sanitizeWidth(width: number): number {
  if (!Number.isFinite(width) || width < 1) return 1;
  return Math.floor(width);
}

function isBreakAfter(ch: string): boolean {
  return ch === " " || ch === "-" || ch === "\t";
}

/** Cells of the longest prefix of `chunk` that ends at a break opportunity; 0 if none. */
function lastBreakCells(chunk: string): number {
  const cells = splitCells(chunk);
  for (let i = cells.length - 1; i >= 0; i--) {
    if (isBreakAfter(cells[i] ?? "")) return i + 1;
  }
  return 0;
}

function lineEndsAtBreak(line: readonly StyledRun[]): boolean {
  const last = line[line.length - 1];
  if (!last || last.text.length === 0) return false;
  const cells = splitCells(last.text);
  return isBreakAfter(cells[cells.length - 1] ?? "");
}

/**
 * Wrap `runs` into lines no wider than `width` cells.
 *
 * A zero, negative or non-finite width is treated as 1. Empty input yields
 * no lines.
 */
export function wrapRuns(
  runs: readonly StyledRun[],
  width: number,
  options?: WrapOptions,
): StyledLine[] {
  const maxWidth = sanitizeWidth(width);
  const wordMode = options?.mode === "word";
  const lines: StyledLine[] = [];
  let current: StyledRun[] = [];
  let currentWidth = 0;
  // Style of the line a `\n` opened; it is emitted even if nothing follows.
  let openedBy: Style | null = null;

  const flush = (): void => {
    lines.push(Object.freeze(current));
    current = [];
    currentWidth = 0;
  };

  for (const run of runs) {
    const segments = run.text.split("\n");
    for (let s = 0; s < segments.length; s++) {
      if (s > 0) {
        if (current.length === 0) current.push(styledRun("", run.style));
        flush();
        openedBy = run.style;
      }

      let rest = segments[s] ?? "";
      while (rest.length > 0) {
        const available = maxWidth - currentWidth;
        const restWidth = measureTextCells(rest);
        openedBy = null;
        if (restWidth <= available) {
          current.push(styledRun(rest, run.style));
          currentWidth += restWidth;
          break;
        }
        if (available <= 0) {
          flush();
          continue;
        }

        let [head, tail] = splitAtCells(rest, available);
        if (wordMode) {
          const breakAt = lastBreakCells(head);
          if (breakAt > 0) {
            [head, tail] = splitAtCells(rest, breakAt);
          } else if (currentWidth > 0 && lineEndsAtBreak(current)) {
            // The word starts a fresh line instead of being cut.
            flush();
            continue;
          }
        }

        current.push(styledRun(head, run.style));
        flush();
        rest = tail;
      }
    }
  }

  if (current.length === 0 && openedBy !== null) current.push(styledRun("", openedBy));
  if (current.length > 0) flush();
  return lines;
}

/** Wrap plain text carrying one style. */
export function wrapText(
  text: string,
  width: number,
  style: Style = DEFAULT_STYLE,
  options?: WrapOptions,
): StyledLine[] {
  if (text.length === 0) return [];
  return wrapRuns([styledRun(text, style)], width, options);
}
