/**
 * packages/core/src/render/drawOps.ts — Draw-operation stream and applier.
 *
 * The coordinator emits an ordered op stream; `applyDrawOps` replays it onto a
 * TerminalSurface. Within a region ops run top-to-bottom, left-to-right, and
 * regions follow the fixed order top, left, main, bottom.
 */

import { BorderWriter } from "../frame/frameRenderer.js";
import type { FrameGlyphRole } from "../frame/glyphs.js";
import { isControlChar, splitCells } from "../layout/textMeasure.js";
import type { Rect, RegionId } from "../layout/types.js";
import { emitRenderAudit } from "../perf/renderAudit.js";
import type { TerminalSurface } from "../surface.js";
import type { Style, StyledRun } from "../text/style.js";

export type ClearOp = Readonly<{ region: RegionId; op: "clear"; rect: Rect }>;

/** Single glyph. Border glyphs carry their `role` so they can be redrawn in ASCII. */
export type PutCharOp = Readonly<{
  region: RegionId;
  op: "putChar";
  row: number;
  col: number;
  glyph: string;
  style: Style;
  role?: FrameGlyphRole;
}>;

export type PutRunOp = Readonly<{
  region: RegionId;
  op: "putRun";
  row: number;
  col: number;
  run: StyledRun;
}>;

export type DrawOp = ClearOp | PutCharOp | PutRunOp;

export type FrameDegradation = Readonly<{ region: RegionId; outcome: "ascii" | "omitted" }>;

export type ApplyReport = Readonly<{
  opsApplied: number;
  cellsWritten: number;
  /** Content cells the surface refused (clipped). */
  cellsRejected: number;
  framesDegraded: readonly FrameDegradation[];
}>;

const REPLACEMENT_CHAR = "�";

/** Map one cell of text to something safe to hand to a terminal. */
export function sanitizeGlyph(ch: string): string {
  if (ch.length === 0) return " ";
  if (isControlChar(ch)) return " ";
  const code = ch.charCodeAt(0);
  if (ch.length === 1 && code >= 0xd800 && code <= 0xdfff) return REPLACEMENT_CHAR;
  return ch;
}

/** Op sort key: row-major within a region, clears first. */
export function compareDrawOps(a: DrawOp, b: DrawOp): number {
  if (a.op === "clear" || b.op === "clear") {
    if (a.op === b.op) return 0;
    return a.op === "clear" ? -1 : 1;
  }
  if (a.row !== b.row) return a.row - b.row;
  return a.col - b.col;
}

/**
 * Apply `ops` to `surface` in order. Does not call `present()`.
 *
 * A rejected border glyph switches that region's border to ASCII (redrawing the
 * cells already placed); a rejected ASCII glyph drops the rest of the border.
 * Rejected content cells are counted and skipped.
 */
export function applyDrawOps(surface: TerminalSurface, ops: readonly DrawOp[]): ApplyReport {
  const frames = new Map<RegionId, BorderWriter>();
  let cellsWritten = 0;
  let cellsRejected = 0;

  const put = (row: number, col: number, glyph: string, style: Style): boolean => {
    if (surface.putChar(row, col, glyph, style) === "ok") {
      cellsWritten++;
      return true;
    }
    return false;
  };

  const putFrameGlyph = (op: PutCharOp, role: FrameGlyphRole): void => {
    let writer = frames.get(op.region);
    if (!writer) {
      writer = new BorderWriter(surface);
      frames.set(op.region, writer);
    }
    writer.put({ row: op.row, col: op.col, role, glyph: op.glyph }, op.style);
  };

  for (const op of ops) {
    switch (op.op) {
      case "clear":
        surface.clearRegion(op.rect);
        break;
      case "putChar":
        if (op.role !== undefined) {
          putFrameGlyph(op, op.role);
        } else if (!put(op.row, op.col, sanitizeGlyph(op.glyph), op.style)) {
          cellsRejected++;
        }
        break;
      case "putRun": {
        const cells = splitCells(op.run.text);
        for (let i = 0; i < cells.length; i++) {
          const glyph = sanitizeGlyph(cells[i] ?? " ");
          if (!put(op.row, op.col + i, glyph, op.run.style)) cellsRejected++;
        }
        break;
      }
    }
  }

  const framesDegraded: FrameDegradation[] = [];
  for (const [region, writer] of frames) {
    cellsWritten += writer.cellsWritten;
    if (writer.mode === "primary") continue;
    framesDegraded.push(Object.freeze({ region, outcome: writer.mode }));
    emitRenderAudit("frame", "degraded", { region, outcome: writer.mode });
  }

  return Object.freeze({
    opsApplied: ops.length,
    cellsWritten,
    cellsRejected,
    framesDegraded: Object.freeze(framesDegraded),
  });
}
