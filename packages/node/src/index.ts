import type { CoordinatorConfig } from "@quadrant-tui/core";
import { type AnsiSurface, createAnsiSurface } from "./ansiSurface.js";
import { type RenderSession, createRenderSession } from "./session.js";

export type { AnsiOutput, AnsiSurface, AnsiSurfaceOptions } from "./ansiSurface.js";
export { createAnsiSurface, sgr } from "./ansiSurface.js";
export type { FrameOutcome, RenderSession, RenderSessionOptions } from "./session.js";
export { createRenderSession } from "./session.js";
export { drawTooSmallScreen, tooSmallScreenLines } from "./tooSmallScreen.js";
export type {
  StatsSample,
  StatsTicker,
  StatsTickerOptions,
  StatsTickerStopResult,
} from "./statsTicker.js";
export {
  DEFAULT_STATS_INTERVAL_MS,
  DEFAULT_STATS_STOP_TIMEOUT_MS,
  createStatsTicker,
} from "./statsTicker.js";

/** Terminal stream shape the stdout renderer needs (`process.stdout` satisfies it). */
export type NodeTerminalStream = {
  rows?: number;
  columns?: number;
  write: (chunk: string) => unknown;
  on: (event: "resize", listener: () => void) => unknown;
  off: (event: "resize", listener: () => void) => unknown;
};

export type NodeRendererOptions = Readonly<{
  stream?: NodeTerminalStream;
  config?: CoordinatorConfig;
  unicode?: boolean;
}>;

export type NodeRenderer = Readonly<{
  surface: AnsiSurface;
  session: RenderSession;
  /** Detach the resize listener. */
  dispose: () => void;
}>;

const FALLBACK_ROWS = 24;
const FALLBACK_COLS = 80;

/**
 * Render session over a TTY stream (default `process.stdout`), tracking resizes.
 * The next `session.frame()` after a resize lays out again.
 */
export function createNodeRenderer(opts: NodeRendererOptions = {}): NodeRenderer {
  const stream: NodeTerminalStream = opts.stream ?? process.stdout;
  const surface = createAnsiSurface({
    output: stream,
    rows: stream.rows ?? FALLBACK_ROWS,
    cols: stream.columns ?? FALLBACK_COLS,
    ...(opts.unicode === undefined ? {} : { unicode: opts.unicode }),
  });
  const session = createRenderSession({
    surface,
    ...(opts.config === undefined ? {} : { config: opts.config }),
  });

  const onResize = (): void => {
    surface.resize(stream.rows ?? FALLBACK_ROWS, stream.columns ?? FALLBACK_COLS);
  };
  stream.on("resize", onResize);

  return Object.freeze({
    surface,
    session,
    dispose: () => {
      stream.off("resize", onResize);
    },
  });
}
