/**
 * packages/core/src/layout/layoutEngine.ts — Fixed four-region layout.
 *
 * The screen is split into a full-width header and footer, a sidebar on the
 * left and the main area filling the rest:
 *
 *   +----------------------------+
 *   | top                        |
 *   +--------+-------------------+
 *   | left   | main              |
 *   +--------+-------------------+
 *   | bottom                     |
 *   +----------------------------+
 *
 * Geometry is a pure function of the terminal size and the resolved config.
 */

import { TerminalTooSmallError, invalidProps } from "../errors.js";
import { emitRenderAudit } from "../perf/renderAudit.js";
import { clampRect } from "./geometry.js";
import type { LayoutPlan, Rect, RegionId, TerminalSize } from "./types.js";

export type LayoutConfig = Readonly<{
  minTerminal?: TerminalSize;
  regionMinimums?: Readonly<Partial<Record<RegionId, TerminalSize>>>;
  headerRows?: number;
  footerRows?: number;
  sidebarMinCols?: number;
  sidebarDivisor?: number;
}>;

/** Resolved configuration with defaults applied. */
export type ResolvedLayoutConfig = Readonly<{
  minTerminal: TerminalSize;
  regionMinimums: Readonly<Record<RegionId, TerminalSize>>;
  headerRows: number;
  footerRows: number;
  sidebarMinCols: number;
  sidebarDivisor: number;
}>;

export type LayoutResult =
  | Readonly<{ ok: true; value: LayoutPlan }>
  | Readonly<{ ok: false; error: TerminalTooSmallError }>;

/** Default configuration values. */
export const DEFAULT_LAYOUT_CONFIG: ResolvedLayoutConfig = Object.freeze({
  minTerminal: Object.freeze({ rows: 60, cols: 120 }),
  regionMinimums: Object.freeze({
    top: Object.freeze({ rows: 3, cols: 30 }),
    left: Object.freeze({ rows: 15, cols: 25 }),
    main: Object.freeze({ rows: 15, cols: 50 }),
    bottom: Object.freeze({ rows: 3, cols: 30 }),
  }),
  headerRows: 3,
  footerRows: 3,
  sidebarMinCols: 25,
  sidebarDivisor: 4,
});

function requirePositiveInt(name: string, v: number): number {
  if (!Number.isInteger(v) || v <= 0) invalidProps(`${name} must be a positive integer`);
  return v;
}

function resolveSize(name: string, v: TerminalSize | undefined, fallback: TerminalSize): TerminalSize {
  if (v === undefined) return fallback;
  return Object.freeze({
    rows: requirePositiveInt(`${name}.rows`, v.rows),
    cols: requirePositiveInt(`${name}.cols`, v.cols),
  });
}

/** Apply defaults to user-provided config, validating all values. */
export function resolveLayoutConfig(config: LayoutConfig | undefined): ResolvedLayoutConfig {
  if (!config) return DEFAULT_LAYOUT_CONFIG;
  const d = DEFAULT_LAYOUT_CONFIG;
  const mins = config.regionMinimums;
  return Object.freeze({
    minTerminal: resolveSize("minTerminal", config.minTerminal, d.minTerminal),
    regionMinimums: Object.freeze({
      top: resolveSize("regionMinimums.top", mins?.top, d.regionMinimums.top),
      left: resolveSize("regionMinimums.left", mins?.left, d.regionMinimums.left),
      main: resolveSize("regionMinimums.main", mins?.main, d.regionMinimums.main),
      bottom: resolveSize("regionMinimums.bottom", mins?.bottom, d.regionMinimums.bottom),
    }),
    headerRows:
      config.headerRows === undefined
        ? d.headerRows
        : requirePositiveInt("headerRows", config.headerRows),
    footerRows:
      config.footerRows === undefined
        ? d.footerRows
        : requirePositiveInt("footerRows", config.footerRows),
    sidebarMinCols:
      config.sidebarMinCols === undefined
        ? d.sidebarMinCols
        : requirePositiveInt("sidebarMinCols", config.sidebarMinCols),
    sidebarDivisor:
      config.sidebarDivisor === undefined
        ? d.sidebarDivisor
        : requirePositiveInt("sidebarDivisor", config.sidebarDivisor),
  });
}

function asResolved(config: LayoutConfig | ResolvedLayoutConfig | undefined): ResolvedLayoutConfig {
  if (config === DEFAULT_LAYOUT_CONFIG || config === undefined) return DEFAULT_LAYOUT_CONFIG;
  return resolveLayoutConfig(config);
}

/** Minimum terminal size as `{rows, cols}` (60x120 by default). */
export function getMinimumTerminalSize(
  config?: LayoutConfig | ResolvedLayoutConfig,
): TerminalSize {
  return asResolved(config).minTerminal;
}

/** Minimum size a region must keep after layout. */
export function getRegionMinimumSize(
  region: RegionId,
  config?: LayoutConfig | ResolvedLayoutConfig,
): TerminalSize {
  return asResolved(config).regionMinimums[region];
}

export function validateTerminalSize(
  rows: number,
  cols: number,
  config?: LayoutConfig | ResolvedLayoutConfig,
): boolean {
  const min = asResolved(config).minTerminal;
  return rows >= min.rows && cols >= min.cols;
}

/** True when the plan was computed for a different terminal size. */
export function detectSizeChange(plan: LayoutPlan | null, rows: number, cols: number): boolean {
  if (plan === null) return true;
  return plan.terminalRows !== rows || plan.terminalCols !== cols;
}

export function layoutRegion(plan: LayoutPlan, region: RegionId): Rect {
  switch (region) {
    case "top":
      return plan.top;
    case "left":
      return plan.left;
    case "main":
      return plan.main;
    case "bottom":
      return plan.bottom;
  }
}

function tooSmall(rows: number, cols: number, resolved: ResolvedLayoutConfig): TerminalTooSmallError {
  return new TerminalTooSmallError({ rows, cols }, resolved.minTerminal);
}

/**
 * Compute the layout, or return the too-small error as a value.
 *
 * Region minimums are checked after geometry so that rounding in the sidebar
 * width cannot starve the main area under a custom config.
 */
export function tryComputeLayout(
  rows: number,
  cols: number,
  config?: LayoutConfig | ResolvedLayoutConfig,
): LayoutResult {
  const resolved = asResolved(config);
  const safeRows = Number.isFinite(rows) ? Math.floor(rows) : 0;
  const safeCols = Number.isFinite(cols) ? Math.floor(cols) : 0;

  if (!validateTerminalSize(safeRows, safeCols, resolved)) {
    return { ok: false, error: tooSmall(safeRows, safeCols, resolved) };
  }

  const header = resolved.headerRows;
  const footer = resolved.footerRows;
  const bodyRows = safeRows - header - footer;
  const sidebarCols = Math.max(
    resolved.sidebarMinCols,
    Math.floor(safeCols / resolved.sidebarDivisor),
  );

  const plan: LayoutPlan = Object.freeze({
    terminalRows: safeRows,
    terminalCols: safeCols,
    top: clampRect(0, 0, safeCols, header),
    left: clampRect(0, header, sidebarCols, bodyRows),
    main: clampRect(sidebarCols, header, safeCols - sidebarCols, bodyRows),
    bottom: clampRect(0, safeRows - footer, safeCols, footer),
  });

  for (const region of ["top", "left", "main", "bottom"] as const) {
    const rect = plan[region];
    const min = resolved.regionMinimums[region];
    if (rect.h < min.rows || rect.w < min.cols) {
      return { ok: false, error: tooSmall(safeRows, safeCols, resolved) };
    }
  }

  return { ok: true, value: plan };
}

/**
 * Compute the four regions for a terminal of `rows` x `cols`.
 *
 * @throws TerminalTooSmallError when the terminal or any derived region is below its minimum
 */
export function computeLayout(
  rows: number,
  cols: number,
  config?: LayoutConfig | ResolvedLayoutConfig,
): LayoutPlan {
  const res = tryComputeLayout(rows, cols, config);
  if (!res.ok) {
    emitRenderAudit("layout", "tooSmall", {
      rows: res.error.current.rows,
      cols: res.error.current.cols,
      minRows: res.error.minimum.rows,
      minCols: res.error.minimum.cols,
    });
    throw res.error;
  }
  emitRenderAudit("layout", "computed", { rows: res.value.terminalRows, cols: res.value.terminalCols });
  return res.value;
}
