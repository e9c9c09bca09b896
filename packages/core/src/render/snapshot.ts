/**
 * packages/core/src/render/snapshot.ts — Application snapshot input.
 *
 * The coordinator receives one immutable snapshot per frame instead of reading
 * shared application state. Every field is optional.
 */

import type { RegionId } from "../layout/types.js";

export type BottomMode = "display" | "input";

export type AppStatistics = Readonly<{
  totalCommands: number;
  lastCommand: string;
  uptimeSec: number;
  contentLines: number;
}>;

/** Progress is a fraction in [0, 1]; leave it out for an indeterminate task. */
export type ProcessingStatus = Readonly<{ message: string; progress?: number }>;

export type AppSnapshot = Readonly<{
  title?: string;
  author?: string;
  version?: string;
  navItems?: readonly string[];
  selectedIndex?: number;
  bodyText?: string;
  /** Shown as a `[Status: ...]` line above the body. */
  bodyStatus?: string;
  /** Replaces the body with a processing notice while set. */
  processing?: ProcessingStatus | null;
  status?: string;
  mode?: BottomMode;
  commandInput?: string;
  statistics?: AppStatistics | null;
}>;

export type NormalizedSnapshot = Readonly<{
  title: string;
  author: string;
  version: string;
  navItems: readonly string[];
  selectedIndex: number;
  bodyText: string;
  bodyStatus: string;
  processing: ProcessingStatus | null;
  status: string;
  mode: BottomMode;
  commandInput: string;
  statistics: AppStatistics | null;
}>;

export const EMPTY_SNAPSHOT: NormalizedSnapshot = Object.freeze({
  title: "",
  author: "",
  version: "",
  navItems: Object.freeze([]),
  selectedIndex: 0,
  bodyText: "",
  bodyStatus: "",
  processing: null,
  status: "",
  mode: "display",
  commandInput: "",
  statistics: null,
});

function clampIndex(index: number | undefined, count: number): number {
  if (count <= 0) return 0;
  if (index === undefined || !Number.isFinite(index)) return 0;
  return Math.min(count - 1, Math.max(0, Math.trunc(index)));
}

function normalizeStatistics(stats: AppStatistics | null | undefined): AppStatistics | null {
  if (!stats) return null;
  return Object.freeze({
    totalCommands: stats.totalCommands,
    lastCommand: stats.lastCommand,
    uptimeSec: stats.uptimeSec,
    contentLines: stats.contentLines,
  });
}

function normalizeProcessing(p: ProcessingStatus | null | undefined): ProcessingStatus | null {
  if (!p) return null;
  if (p.progress === undefined || !Number.isFinite(p.progress)) {
    return Object.freeze({ message: p.message });
  }
  return Object.freeze({ message: p.message, progress: p.progress });
}

/** Fill defaults and clamp `selectedIndex` into the item range. */
export function normalizeSnapshot(snapshot: AppSnapshot | undefined): NormalizedSnapshot {
  if (!snapshot) return EMPTY_SNAPSHOT;
  const navItems = Object.freeze((snapshot.navItems ?? []).slice());
  return Object.freeze({
    title: snapshot.title ?? "",
    author: snapshot.author ?? "",
    version: snapshot.version ?? "",
    navItems,
    selectedIndex: clampIndex(snapshot.selectedIndex, navItems.length),
    bodyText: snapshot.bodyText ?? "",
    bodyStatus: snapshot.bodyStatus ?? "",
    processing: normalizeProcessing(snapshot.processing),
    status: snapshot.status ?? "",
    mode: snapshot.mode === "input" ? "input" : "display",
    commandInput: snapshot.commandInput ?? "",
    statistics: normalizeStatistics(snapshot.statistics),
  });
}

function sameItems(a: readonly string[], b: readonly string[]): boolean {
  if (a === b) return true;
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

function sameStatistics(a: AppStatistics | null, b: AppStatistics | null): boolean {
  if (a === b) return true;
  if (a === null || b === null) return false;
  return (
    a.totalCommands === b.totalCommands &&
    a.lastCommand === b.lastCommand &&
    a.uptimeSec === b.uptimeSec &&
    a.contentLines === b.contentLines
  );
}

function sameProcessing(a: ProcessingStatus | null, b: ProcessingStatus | null): boolean {
  if (a === b) return true;
  if (a === null || b === null) return false;
  return a.message === b.message && a.progress === b.progress;
}

/**
 * Regions whose field group differs between the two snapshots, in redraw order.
 * A null `prev` (first frame) dirties every region.
 */
export function diffSnapshots(
  prev: NormalizedSnapshot | null,
  next: NormalizedSnapshot,
): readonly RegionId[] {
  if (prev === null) return Object.freeze(["top", "left", "main", "bottom"] as const);
  const out: RegionId[] = [];
  if (prev.title !== next.title || prev.author !== next.author || prev.version !== next.version) {
    out.push("top");
  }
  if (!sameItems(prev.navItems, next.navItems) || prev.selectedIndex !== next.selectedIndex) {
    out.push("left");
  }
  if (
    prev.bodyText !== next.bodyText ||
    prev.bodyStatus !== next.bodyStatus ||
    !sameProcessing(prev.processing, next.processing)
  ) {
    out.push("main");
  }
  if (
    prev.status !== next.status ||
    prev.mode !== next.mode ||
    prev.commandInput !== next.commandInput ||
    !sameStatistics(prev.statistics, next.statistics)
  ) {
    out.push("bottom");
  }
  return Object.freeze(out);
}
