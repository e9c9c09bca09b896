/**
 * packages/node/src/session.ts — One render loop step per call.
 *
 * The session owns the coordinator's lifecycle against a surface whose size
 * may change between frames:
 *   - builds the coordinator on first use, resizes it when the surface changed
 *   - shows the too-small screen when the layout cannot be computed, and
 *     retries on every later frame
 *   - otherwise applies the coordinator's ops and presents
 */

import {
  type AppSnapshot,
  type ApplyReport,
  type CoordinatorConfig,
  RenderCoordinator,
  type TerminalSize,
  type TerminalSurface,
  applyDrawOps,
  detectSizeChange,
  emitRenderAudit,
  getMinimumTerminalSize,
  isTerminalTooSmallError,
} from "@quadrant-tui/core";
import { drawTooSmallScreen } from "./tooSmallScreen.js";

export type FrameOutcome = "rendered" | "idle" | "tooSmall";

export type RenderSessionOptions = Readonly<{
  surface: TerminalSurface;
  config?: CoordinatorConfig;
}>;

export type RenderSession = Readonly<{
  frame: (snapshot?: AppSnapshot) => FrameOutcome;
  /** Null until the first frame that fit. */
  coordinator: () => RenderCoordinator | null;
  lastReport: () => ApplyReport | null;
}>;

function sameSize(a: TerminalSize | null, b: TerminalSize): boolean {
  return a !== null && a.rows === b.rows && a.cols === b.cols;
}

export function createRenderSession(opts: RenderSessionOptions): RenderSession {
  const { surface } = opts;
  const config: CoordinatorConfig = opts.config ?? {};
  let coordinator: RenderCoordinator | null = null;
  let tooSmallAt: TerminalSize | null = null;
  let lastReport: ApplyReport | null = null;

  const showTooSmall = (size: TerminalSize): FrameOutcome => {
    if (sameSize(tooSmallAt, size)) return "tooSmall";
    tooSmallAt = size;
    const minimum = getMinimumTerminalSize(config.layout);
    emitRenderAudit("session", "tooSmall", {
      rows: size.rows,
      cols: size.cols,
      minRows: minimum.rows,
      minCols: minimum.cols,
    });
    drawTooSmallScreen(surface, size, minimum);
    return "tooSmall";
  };

  const frame = (snapshot?: AppSnapshot): FrameOutcome => {
    const size = surface.size();
    if (detectSizeChange(coordinator?.layout ?? null, size.rows, size.cols)) {
      try {
        if (coordinator === null) coordinator = new RenderCoordinator(size, config);
        else coordinator.resize(size);
      } catch (error: unknown) {
        if (!isTerminalTooSmallError(error)) throw error;
        return showTooSmall(size);
      }
    }
    if (coordinator === null) return showTooSmall(size);

    if (tooSmallAt !== null) {
      // The message is still on screen when the size returns to the last good layout.
      tooSmallAt = null;
      coordinator.invalidate();
    }

    const ops = coordinator.update(snapshot);
    if (ops.length === 0) return "idle";
    lastReport = applyDrawOps(surface, ops);
    surface.present();
    return "rendered";
  };

  return Object.freeze({
    frame,
    coordinator: () => coordinator,
    lastReport: () => lastReport,
  });
}
