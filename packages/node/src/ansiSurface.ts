/**
 * packages/node/src/ansiSurface.ts — ANSI terminal surface over a writable stream.
 *
 * Writes go to a back buffer of cells; `present()` diffs it against what was
 * last flushed and emits one write with cursor moves, SGR changes and glyphs
 * for the changed cells only.
 *
 * `putChar` reports failure for out-of-bounds cells, for glyphs that are not
 * exactly one cell wide and, when `unicode` is false, for anything outside
 * printable ASCII. The core uses that signal to fall back to ASCII borders.
 */

import {
  DEFAULT_STYLE,
  type PutCharResult,
  type Rect,
  type Style,
  type TerminalSize,
  type TerminalSurface,
  measureTextCells,
  styleEquals,
} from "@quadrant-tui/core";

export type AnsiOutput = Readonly<{ write: (chunk: string) => unknown }>;

export type AnsiSurfaceOptions = Readonly<{
  output: AnsiOutput;
  rows: number;
  cols: number;
  /** Accept non-ASCII glyphs. Default: true. */
  unicode?: boolean;
}>;

export interface AnsiSurface extends TerminalSurface {
  readonly unicode: boolean;
  /** Reallocate the grid; the next `present()` repaints every cell. */
  resize(rows: number, cols: number): void;
}

type Cell = Readonly<{ glyph: string; style: Style }>;

const ESC = "\x1b[";
const SGR_RESET = `${ESC}0m`;
const BLANK: Cell = Object.freeze({ glyph: " ", style: DEFAULT_STYLE });

const FG_CODES: Readonly<Record<Style["fg"], number>> = Object.freeze({
  default: 39,
  black: 30,
  red: 31,
  green: 32,
  yellow: 33,
  blue: 34,
  magenta: 35,
  cyan: 36,
  white: 37,
});

function moveTo(row: number, col: number): string {
  return `${ESC}${row + 1};${col + 1}H`;
}

/** Full SGR sequence for `style`, starting from a reset. */
export function sgr(style: Style): string {
  const codes: number[] = [0];
  if (style.weight === "bold") codes.push(1);
  else if (style.weight === "dim") codes.push(2);
  if (style.decoration === "underline") codes.push(4);
  else if (style.decoration === "blink") codes.push(5);
  else if (style.decoration === "reverse") codes.push(7);
  if (style.fg !== "default") codes.push(FG_CODES[style.fg]);
  if (style.bg !== "default") codes.push(FG_CODES[style.bg] + 10);
  return `${ESC}${codes.join(";")}m`;
}

function isPrintableAscii(glyph: string): boolean {
  const code = glyph.charCodeAt(0);
  return glyph.length === 1 && code >= 0x20 && code < 0x7f;
}

function sameCell(a: Cell | null, b: Cell): boolean {
  return a !== null && a.glyph === b.glyph && styleEquals(a.style, b.style);
}

function sanitizeDim(v: number): number {
  return Number.isFinite(v) ? Math.max(0, Math.trunc(v)) : 0;
}

class AnsiTerminalSurface implements AnsiSurface {
  readonly unicode: boolean;
  private readonly output: AnsiOutput;
  private rows = 0;
  private cols = 0;
  private back: Cell[] = [];
  /** What the terminal shows; null = unknown, always repainted. */
  private front: Array<Cell | null> = [];

  constructor(opts: AnsiSurfaceOptions) {
    this.output = opts.output;
    this.unicode = opts.unicode ?? true;
    this.resize(opts.rows, opts.cols);
  }

  size(): TerminalSize {
    return Object.freeze({ rows: this.rows, cols: this.cols });
  }

  putChar(row: number, col: number, glyph: string, style: Style): PutCharResult {
    if (row < 0 || row >= this.rows || col < 0 || col >= this.cols) return "failure";
    if (measureTextCells(glyph) !== 1) return "failure";
    if (!this.unicode && !isPrintableAscii(glyph)) return "failure";
    this.back[row * this.cols + col] = Object.freeze({ glyph, style });
    return "ok";
  }

  clearRegion(rect: Rect): void {
    const y1 = Math.min(this.rows, rect.y + rect.h);
    const x1 = Math.min(this.cols, rect.x + rect.w);
    for (let y = Math.max(0, rect.y); y < y1; y++) {
      for (let x = Math.max(0, rect.x); x < x1; x++) this.back[y * this.cols + x] = BLANK;
    }
  }

  present(): void {
    let out = "";
    let cursor = -1;
    let style: Style | null = null;

    for (let i = 0; i < this.back.length; i++) {
      const cell = this.back[i] ?? BLANK;
      if (sameCell(this.front[i] ?? null, cell)) continue;

      if (cursor !== i) out += moveTo(Math.floor(i / this.cols), i % this.cols);
      if (style === null || !styleEquals(style, cell.style)) {
        out += sgr(cell.style);
        style = cell.style;
      }
      out += cell.glyph;
      this.front[i] = cell;
      // The cursor wraps at the right edge; re-address the next row explicitly.
      cursor = (i + 1) % this.cols === 0 ? -1 : i + 1;
    }

    if (out.length === 0) return;
    this.output.write(`${out}${SGR_RESET}`);
  }

  resize(rows: number, cols: number): void {
    this.rows = sanitizeDim(rows);
    this.cols = sanitizeDim(cols);
    const n = this.rows * this.cols;
    this.back = new Array<Cell>(n).fill(BLANK);
    this.front = new Array<Cell | null>(n).fill(null);
  }
}

export function createAnsiSurface(opts: AnsiSurfaceOptions): AnsiSurface {
  return new AnsiTerminalSurface(opts);
}
