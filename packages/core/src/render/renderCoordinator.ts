/**
 * packages/core/src/render/renderCoordinator.ts — Snapshot-driven region redraws.
 *
 * The coordinator owns one ContentBuffer per region and turns each snapshot
 * into the draw ops for the regions that changed since the previous one.
 *
 * Per update:
 *   1. diff field groups against the last snapshot, plus buffers that changed
 *      on their own (scrolls, appends)
 *   2. refresh the buffers of dirty regions
 *   3. emit clear + border + content ops per dirty region, regions in fixed order
 *   4. store the snapshot and close the frame
 *
 * An unchanged snapshot yields no ops.
 */

import { ContentBuffer, type ScrollInfo } from "../content/contentBuffer.js";
import { border, contentArea } from "../frame/frameRenderer.js";
import { DEFAULT_FRAME_STYLE, type FrameStyle } from "../frame/glyphs.js";
import {
  type LayoutConfig,
  type ResolvedLayoutConfig,
  computeLayout,
  layoutRegion,
  resolveLayoutConfig,
} from "../layout/layoutEngine.js";
import { measureTextCells } from "../layout/textMeasure.js";
import { REGION_ORDER, type LayoutPlan, type RegionId, type TerminalSize } from "../layout/types.js";
import { emitRenderAudit } from "../perf/renderAudit.js";
import type { FingerprintStrategy } from "../text/fingerprint.js";
import { DEFAULT_STYLE, type StyledRun, styledRun } from "../text/style.js";
import type { WrapMode } from "../text/wrap.js";
import { DirtyTracker } from "./dirtyTracker.js";
import { type DrawOp, compareDrawOps } from "./drawOps.js";
import { formatNavList } from "./navList.js";
import { formatFooter, formatHeader, formatMainBody } from "./regionContent.js";
import {
  type AppSnapshot,
  type NormalizedSnapshot,
  diffSnapshots,
  normalizeSnapshot,
} from "./snapshot.js";

export type CoordinatorConfig = Readonly<{
  frameStyle?: FrameStyle;
  layout?: LayoutConfig;
  fingerprint?: FingerprintStrategy;
  wrapMode?: WrapMode;
}>;

export type ScrollDirection = "up" | "down";

const LINE_BREAK = styledRun("\n", DEFAULT_STYLE);

type RegionBuffers = Readonly<Record<RegionId, ContentBuffer>>;

export class RenderCoordinator {
  private readonly layoutConfig: ResolvedLayoutConfig;
  private readonly buffers: RegionBuffers;
  private readonly tracker = new DirtyTracker();
  private plan: LayoutPlan;
  private lastSnapshot: NormalizedSnapshot | null = null;
  private currentFrameStyle: FrameStyle;

  /** @throws TerminalTooSmallError */
  constructor(size: TerminalSize, config: CoordinatorConfig = {}) {
    this.layoutConfig = resolveLayoutConfig(config.layout);
    this.currentFrameStyle = config.frameStyle ?? DEFAULT_FRAME_STYLE;
    this.plan = computeLayout(size.rows, size.cols, this.layoutConfig);

    const plan = this.plan;
    const makeBuffer = (id: RegionId): ContentBuffer => {
      const area = contentArea(layoutRegion(plan, id));
      return new ContentBuffer({
        width: area.w,
        height: area.h,
        fingerprint: config.fingerprint,
        wrapMode: config.wrapMode,
      });
    };
    this.buffers = Object.freeze({
      top: makeBuffer("top"),
      left: makeBuffer("left"),
      main: makeBuffer("main"),
      bottom: makeBuffer("bottom"),
    });
    this.tracker.markAllDirty();
  }

  get layout(): LayoutPlan {
    return this.plan;
  }

  get frameStyle(): FrameStyle {
    return this.currentFrameStyle;
  }

  setFrameStyle(style: FrameStyle): void {
    if (style === this.currentFrameStyle) return;
    this.currentFrameStyle = style;
    this.tracker.markAllDirty();
  }

  buffer(id: RegionId): ContentBuffer {
    return this.buffers[id];
  }

  /** Force a full redraw on the next update. */
  invalidate(): void {
    this.tracker.markAllDirty();
  }

  /**
   * Recompute the layout for a new terminal size and resize every buffer.
   *
   * @throws TerminalTooSmallError, leaving the previous layout in place
   */
  resize(size: TerminalSize): void {
    const plan = computeLayout(size.rows, size.cols, this.layoutConfig);
    this.plan = plan;
    for (const id of REGION_ORDER) {
      const area = contentArea(layoutRegion(plan, id));
      this.buffer(id).resize(area.w, area.h);
    }
    this.tracker.markAllDirty();
    emitRenderAudit("coordinator", "resize", { rows: plan.terminalRows, cols: plan.terminalCols });
  }

  /** Regions queued for the next update, in redraw order. */
  dirtyRegions(): readonly RegionId[] {
    const pending = new Set<RegionId>(this.tracker.dirtyRegions());
    for (const id of REGION_ORDER) {
      if (this.buffer(id).hasChanged()) pending.add(id);
    }
    return Object.freeze(REGION_ORDER.filter((id) => pending.has(id)));
  }

  scrollMain(direction: ScrollDirection, lines = 1): void {
    const main = this.buffer("main");
    if (direction === "up") main.scrollUp(lines);
    else main.scrollDown(lines);
  }

  appendMain(content: string | readonly StyledRun[]): void {
    this.buffer("main").appendLine(content);
  }

  clearMain(): void {
    this.buffer("main").clear();
  }

  mainScrollInfo(): ScrollInfo {
    return this.buffer("main").scrollInfo();
  }

  update(snapshot?: AppSnapshot): DrawOp[] {
    const next = normalizeSnapshot(snapshot);
    const changed = diffSnapshots(this.lastSnapshot, next);
    for (const id of changed) this.tracker.markDirty(id);

    for (const id of this.tracker.dirtyRegions()) {
      // Main is only reset when its source fields changed, so appended lines survive redraws.
      if (id !== "main" || changed.includes("main")) this.refreshBuffer(id, next);
    }
    for (const id of REGION_ORDER) {
      if (this.buffer(id).hasChanged()) this.tracker.markDirty(id);
    }

    const ops: DrawOp[] = [];
    const dirty = this.tracker.dirtyRegions();
    for (const id of dirty) {
      for (const op of this.regionOps(id)) ops.push(op);
      this.buffer(id).acknowledgeChange();
      this.tracker.markRendered(id);
    }

    this.lastSnapshot = next;
    this.tracker.commit();
    if (dirty.length > 0) {
      emitRenderAudit("coordinator", "update", { dirty: dirty.join(","), ops: ops.length });
    }
    return ops;
  }

  private refreshBuffer(id: RegionId, snapshot: NormalizedSnapshot): void {
    const buf = this.buffer(id);
    switch (id) {
      case "top":
        buf.setCenteredText(formatHeader(snapshot.title, snapshot.author, snapshot.version));
        return;
      case "left": {
        const view = formatNavList(snapshot.navItems, snapshot.selectedIndex, buf.width, buf.height);
        const runs: StyledRun[] = [];
        view.rows.forEach((row, i) => {
          if (i > 0) runs.push(LINE_BREAK);
          for (const run of row) runs.push(run);
        });
        buf.setFormatted(runs);
        return;
      }
      case "main":
        buf.setText(formatMainBody(snapshot));
        return;
      case "bottom":
        buf.setText(formatFooter(snapshot, buf.width).join("\n"));
        return;
    }
  }

  private regionOps(id: RegionId): DrawOp[] {
    const rect = layoutRegion(this.plan, id);
    const area = contentArea(rect);
    const ops: DrawOp[] = [];

    for (const cell of border(rect, this.currentFrameStyle)) {
      ops.push(
        Object.freeze({
          region: id,
          op: "putChar",
          row: cell.row,
          col: cell.col,
          glyph: cell.glyph,
          style: DEFAULT_STYLE,
          role: cell.role,
        }),
      );
    }

    this.buffer(id)
      .visibleLines()
      .forEach((line, i) => {
        let col = area.x;
        for (const run of line) {
          const width = measureTextCells(run.text);
          if (width > 0) {
            ops.push(Object.freeze({ region: id, op: "putRun", row: area.y + i, col, run }));
          }
          col += width;
        }
      });

    ops.sort(compareDrawOps);
    ops.unshift(Object.freeze({ region: id, op: "clear", rect }));
    return ops;
  }
}
