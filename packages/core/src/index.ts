/**
 * @quadrant-tui/core
 *
 * Runtime-agnostic rendering core for a fixed four-region terminal screen.
 * This package MUST NOT use Node-specific APIs (Buffer, worker_threads, node:* imports).
 */

// =============================================================================
// Errors
// =============================================================================

export {
  QuadrantError,
  TerminalTooSmallError,
  invalidProps,
  isTerminalTooSmallError,
  type QuadrantErrorCode,
} from "./errors.js";

// =============================================================================
// Geometry + layout
// =============================================================================

export {
  REGION_ORDER,
  type LayoutPlan,
  type Rect,
  type RegionId,
  type TerminalSize,
} from "./layout/types.js";
export {
  clampRect,
  rectArea,
  rectContainsCell,
  rectWithin,
  rectsOverlap,
} from "./layout/geometry.js";
export {
  DEFAULT_LAYOUT_CONFIG,
  computeLayout,
  detectSizeChange,
  getMinimumTerminalSize,
  getRegionMinimumSize,
  layoutRegion,
  resolveLayoutConfig,
  tryComputeLayout,
  validateTerminalSize,
  type LayoutConfig,
  type LayoutResult,
  type ResolvedLayoutConfig,
} from "./layout/layoutEngine.js";
export {
  measureTextCells,
  padEndCells,
  splitAtCells,
  takeTailCells,
  truncateWithEllipsis,
} from "./layout/textMeasure.js";

// =============================================================================
// Text
// =============================================================================

export {
  COLORS,
  DEFAULT_STYLE,
  createStyle,
  isColor,
  lineText,
  lineWidth,
  styleEquals,
  styledRun,
  type Color,
  type FontWeight,
  type Style,
  type StyledLine,
  type StyledRun,
  type TextDecoration,
} from "./text/style.js";
export { wrapRuns, wrapText, type WrapMode, type WrapOptions } from "./text/wrap.js";
export {
  fnv1aFingerprint,
  hashFnv1a32,
  identityFingerprint,
  type FingerprintStrategy,
} from "./text/fingerprint.js";

// =============================================================================
// Content + frames
// =============================================================================

export {
  ContentBuffer,
  type ContentAlign,
  type ContentBufferOptions,
  type ScrollInfo,
} from "./content/contentBuffer.js";
export {
  ASCII_FRAME_GLYPHS,
  DEFAULT_FRAME_STYLE,
  FRAME_GLYPHS,
  getFrameGlyphs,
  isFrameStyle,
  readFrameStyle,
  type FrameGlyphRole,
  type FrameGlyphSet,
  type FrameStyle,
} from "./frame/glyphs.js";
export {
  BorderWriter,
  MIN_FRAMED_SIDE,
  border,
  borderWithGlyphs,
  contentArea,
  drawBorderCells,
  drawFrame,
  type BorderCell,
  type FrameDrawOutcome,
} from "./frame/frameRenderer.js";

// =============================================================================
// Rendering
// =============================================================================

export type { PutCharResult, TerminalSurface } from "./surface.js";
export {
  applyDrawOps,
  compareDrawOps,
  sanitizeGlyph,
  type ApplyReport,
  type ClearOp,
  type DrawOp,
  type FrameDegradation,
  type PutCharOp,
  type PutRunOp,
} from "./render/drawOps.js";
export { DirtyTracker, type RegionRenderState } from "./render/dirtyTracker.js";
export {
  EMPTY_SNAPSHOT,
  diffSnapshots,
  normalizeSnapshot,
  type AppSnapshot,
  type AppStatistics,
  type BottomMode,
  type NormalizedSnapshot,
  type ProcessingStatus,
} from "./render/snapshot.js";
export {
  NAV_EMPTY_PLACEHOLDER,
  NAV_SELECTED_STYLE,
  formatNavList,
  navScrollOffset,
  type NavListView,
} from "./render/navList.js";
export {
  PROCESSING_FOOTNOTE,
  PROGRESS_BAR_WIDTH,
  formatBodyWithStatus,
  formatCommandLine,
  formatFooter,
  formatHeader,
  formatMainBody,
  formatProcessingStatus,
  formatProgressBar,
  formatStatistics,
} from "./render/regionContent.js";
export {
  RenderCoordinator,
  type CoordinatorConfig,
  type ScrollDirection,
} from "./render/renderCoordinator.js";

// =============================================================================
// Shared state + diagnostics
// =============================================================================

export { createSnapshotStore, type SnapshotStore } from "./state/snapshotStore.js";
export {
  RENDER_AUDIT_ENABLED,
  emitRenderAudit,
  isRenderAuditEnabled,
  setRenderAuditSink,
  type RenderAuditFields,
  type RenderAuditSink,
} from "./perf/renderAudit.js";
