/**
 * packages/core/src/content/contentBuffer.ts — Wrapped, scrollable region content.
 *
 * A buffer keeps the logical source blocks it was given (one per setText /
 * appendLine call) next to their wrapped lines, so a viewport resize can
 * re-wrap everything at the new width.
 *
 * Invariants:
 *   - 0 <= scrollOffset <= max(0, lineCount - height)
 *   - every line is at most `width` cells wide
 *
 * No operation throws; empty text is a valid, defined input.
 */

import { type FingerprintStrategy, fnv1aFingerprint } from "../text/fingerprint.js";
import {
  DEFAULT_STYLE,
  type Style,
  type StyledLine,
  type StyledRun,
  lineWidth,
  styledRun,
} from "../text/style.js";
import { type WrapMode, wrapRuns } from "../text/wrap.js";

export type ContentAlign = "start" | "center";

export type ContentBufferOptions = Readonly<{
  width: number;
  height: number;
  fingerprint?: FingerprintStrategy;
  wrapMode?: WrapMode;
}>;

export type ScrollInfo = Readonly<{
  offset: number;
  totalLines: number;
  viewportHeight: number;
}>;

type SourceBlock = Readonly<{
  runs: readonly StyledRun[];
  align: ContentAlign;
  /** Style of the blank line an empty append produces. */
  style: Style;
  /** Appended blocks always occupy at least one line; set blocks may be empty. */
  keepBlank: boolean;
}>;

function sanitizeWidth(v: number): number {
  if (!Number.isFinite(v) || v < 1) return 1;
  return Math.floor(v);
}

function sanitizeHeight(v: number): number {
  if (!Number.isFinite(v) || v < 0) return 0;
  return Math.floor(v);
}

function sanitizeCount(n: number): number {
  if (!Number.isFinite(n) || n <= 0) return 0;
  return Math.floor(n);
}

function styleKey(style: Style): string {
  return `${style.weight}/${style.decoration}/${style.fg}/${style.bg}`;
}

function contentKey(runs: readonly StyledRun[], align: ContentAlign): string {
  let key: string = align;
  for (const run of runs) key += `\u0000${styleKey(run.style)}\u0001${run.text}`;
  return key;
}

function centerLine(line: StyledLine, width: number): StyledLine {
  const pad = Math.floor((width - lineWidth(line)) / 2);
  if (pad <= 0) return line;
  const first = line[0];
  return Object.freeze([styledRun(" ".repeat(pad), first?.style ?? DEFAULT_STYLE), ...line]);
}

export class ContentBuffer {
  private readonly fingerprintStrategy: FingerprintStrategy;
  private readonly wrapMode: WrapMode;
  private blocks: SourceBlock[] = [];
  private lines: StyledLine[] = [];
  private offset = 0;
  private viewportWidth: number;
  private viewportHeight: number;
  private lastFingerprint: string | null = null;
  /** Input the last fingerprint was taken over; equal fingerprints alone may collide. */
  private lastKey: string | null = null;
  private changed = false;

  constructor(options: ContentBufferOptions) {
    this.viewportWidth = sanitizeWidth(options.width);
    this.viewportHeight = sanitizeHeight(options.height);
    this.fingerprintStrategy = options.fingerprint ?? fnv1aFingerprint;
    this.wrapMode = options.wrapMode ?? "char";
  }

  get width(): number {
    return this.viewportWidth;
  }

  get height(): number {
    return this.viewportHeight;
  }

  get scrollOffset(): number {
    return this.offset;
  }

  get lineCount(): number {
    return this.lines.length;
  }

  /** Fingerprint of the last set content, or null once appends/clears invalidated it. */
  get fingerprint(): string | null {
    return this.lastFingerprint;
  }

  /** Replace all content with uniformly styled text. Unchanged text is a no-op. */
  setText(text: string, style: Style = DEFAULT_STYLE): void {
    this.replace([styledRun(text, style)], "start", style);
  }

  /** Replace all content with pre-styled runs. Unchanged runs are a no-op. */
  setFormatted(runs: readonly StyledRun[]): void {
    this.replace(runs, "start", runs[0]?.style ?? DEFAULT_STYLE);
  }

  /** Replace all content, centring every wrapped line in the viewport. */
  setCenteredText(text: string, style: Style = DEFAULT_STYLE): void {
    this.replace([styledRun(text, style)], "center", style);
  }

  /**
   * Wrap and append one logical line.
   *
   * Follows the tail: when the viewport showed the last line before the
   * append, it shows the last line after it.
   */
  appendLine(content: string | readonly StyledRun[], style: Style = DEFAULT_STYLE): void {
    const runs = typeof content === "string" ? [styledRun(content, style)] : content;
    const block: SourceBlock = Object.freeze({
      runs: Object.freeze(runs.slice()),
      align: "start",
      style: runs[0]?.style ?? style,
      keepBlank: true,
    });
    const wrapped = this.wrapBlock(block);
    const atBottom = this.offset + this.viewportHeight >= this.lines.length;

    this.blocks.push(block);
    for (const line of wrapped) this.lines.push(line);
    this.lastFingerprint = null;
    this.lastKey = null;
    this.changed = true;

    if (atBottom) this.offset = this.maxScroll();
  }

  clear(): void {
    if (this.lines.length > 0 || this.blocks.length > 0) {
      this.changed = true;
      this.lastFingerprint = null;
      this.lastKey = null;
    }
    this.blocks = [];
    this.lines = [];
    this.offset = 0;
  }

  scrollUp(n = 1): void {
    this.scrollTo(this.offset - sanitizeCount(n));
  }

  scrollDown(n = 1): void {
    this.scrollTo(this.offset + sanitizeCount(n));
  }

  scrollToTop(): void {
    this.scrollTo(0);
  }

  scrollToBottom(): void {
    this.scrollTo(this.maxScroll());
  }

  canScrollUp(): boolean {
    return this.offset > 0;
  }

  canScrollDown(): boolean {
    return this.offset + this.viewportHeight < this.lines.length;
  }

  scrollInfo(): ScrollInfo {
    return Object.freeze({
      offset: this.offset,
      totalLines: this.lines.length,
      viewportHeight: this.viewportHeight,
    });
  }

  /** Lines inside the viewport; shorter than `height` at the end of content. */
  visibleLines(): readonly StyledLine[] {
    return Object.freeze(this.lines.slice(this.offset, this.offset + this.viewportHeight));
  }

  contentLines(): readonly StyledLine[] {
    return Object.freeze(this.lines.slice());
  }

  /** Re-wrap every source block for a new viewport and re-clamp the offset. */
  resize(width: number, height: number): void {
    const nextWidth = sanitizeWidth(width);
    const nextHeight = sanitizeHeight(height);
    if (nextWidth === this.viewportWidth && nextHeight === this.viewportHeight) return;

    const wasAtBottom = this.offset > 0 && this.offset >= this.maxScroll();
    this.viewportWidth = nextWidth;
    this.viewportHeight = nextHeight;
    this.rewrap();
    this.offset = wasAtBottom ? this.maxScroll() : Math.min(this.offset, this.maxScroll());
    this.changed = true;
  }

  /** True when anything visible changed since the last acknowledgeChange(). */
  hasChanged(): boolean {
    return this.changed;
  }

  acknowledgeChange(): void {
    this.changed = false;
  }

  private replace(runs: readonly StyledRun[], align: ContentAlign, style: Style): void {
    const key = contentKey(runs, align);
    const fingerprint = this.fingerprintStrategy.fingerprint(key);
    if (fingerprint === this.lastFingerprint && key === this.lastKey) return;

    this.blocks = [
      Object.freeze({ runs: Object.freeze(runs.slice()), align, style, keepBlank: false }),
    ];
    this.rewrap();
    this.offset = 0;
    this.lastFingerprint = fingerprint;
    this.lastKey = key;
    this.changed = true;
  }

  private rewrap(): void {
    const out: StyledLine[] = [];
    for (const block of this.blocks) {
      for (const line of this.wrapBlock(block)) out.push(line);
    }
    this.lines = out;
  }

  private wrapBlock(block: SourceBlock): StyledLine[] {
    const wrapped = wrapRuns(block.runs, this.viewportWidth, { mode: this.wrapMode });
    if (wrapped.length === 0 && block.keepBlank) {
      return [Object.freeze([styledRun("", block.style)])];
    }
    if (block.align !== "center") return wrapped;
    return wrapped.map((line) => centerLine(line, this.viewportWidth));
  }

  private maxScroll(): number {
    return Math.max(0, this.lines.length - this.viewportHeight);
  }

  private scrollTo(target: number): void {
    const next = Math.min(Math.max(0, target), this.maxScroll());
    if (next === this.offset) return;
    this.offset = next;
    this.changed = true;
  }
}
