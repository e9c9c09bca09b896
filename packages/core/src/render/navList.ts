/**
 * packages/core/src/render/navList.ts — Navigation list rows for the left region.
 *
 * Each row is exactly `width` cells: `" 1. item"` padded with spaces, the
 * selected row drawn reversed with `"> "` over its two number columns. When the list is
 * taller than the viewport it scrolls to keep the selection visible and marks
 * hidden items with `^` / `v` in the last column.
 */

import { padEndCells, splitAtCells, truncateWithEllipsis } from "../layout/textMeasure.js";
import { DEFAULT_STYLE, type Style, type StyledLine, createStyle, styledRun } from "../text/style.js";

export const NAV_EMPTY_PLACEHOLDER = "No items";
export const NAV_SCROLL_UP_GLYPH = "^";
export const NAV_SCROLL_DOWN_GLYPH = "v";

export const NAV_SELECTED_STYLE: Style = createStyle({ decoration: "reverse" });

export type NavListView = Readonly<{
  rows: readonly StyledLine[];
  scrollOffset: number;
  hasMoreAbove: boolean;
  hasMoreBelow: boolean;
}>;

/** Top item index that keeps `selected` inside a `height`-row window. */
export function navScrollOffset(count: number, selected: number, height: number): number {
  if (height <= 0 || count <= height) return 0;
  const maxScroll = count - height;
  const offset = selected >= height ? selected - height + 1 : 0;
  return Math.min(Math.max(0, offset), maxScroll);
}

function numberPrefix(index: number): string {
  return `${String(index + 1).padStart(2, " ")}. `;
}

function selectedPrefix(prefix: string): string {
  return `> ${prefix.slice(2)}`;
}

function fitRow(text: string, width: number): string {
  const [head] = splitAtCells(padEndCells(text, width), width);
  return head;
}

function withIndicator(text: string, style: Style, glyph: string, width: number): StyledLine {
  const [head] = splitAtCells(text, width - 1);
  return Object.freeze([styledRun(head, style), styledRun(glyph, DEFAULT_STYLE)]);
}

/**
 * Rows for the visible window of `items`.
 *
 * `selected` is clamped; an empty list renders the placeholder when it fits.
 */
export function formatNavList(
  items: readonly string[],
  selected: number,
  width: number,
  height: number,
): NavListView {
  if (width <= 0 || height <= 0) {
    return Object.freeze({ rows: [], scrollOffset: 0, hasMoreAbove: false, hasMoreBelow: false });
  }
  if (items.length === 0) {
    const rows: StyledLine[] =
      NAV_EMPTY_PLACEHOLDER.length <= width
        ? [Object.freeze([styledRun(NAV_EMPTY_PLACEHOLDER, DEFAULT_STYLE)])]
        : [];
    return Object.freeze({ rows, scrollOffset: 0, hasMoreAbove: false, hasMoreBelow: false });
  }

  const sel = Math.min(items.length - 1, Math.max(0, Math.trunc(selected)));
  const offset = navScrollOffset(items.length, sel, height);
  const visible = Math.min(height, items.length - offset);
  const hasMoreAbove = offset > 0;
  const hasMoreBelow = offset + height < items.length;
  const rows: StyledLine[] = [];

  for (let i = 0; i < visible; i++) {
    const index = offset + i;
    const prefix = numberPrefix(index);
    const item = truncateWithEllipsis(items[index] ?? "", width - prefix.length);
    const isSelected = index === sel;
    const text = fitRow(`${isSelected ? selectedPrefix(prefix) : prefix}${item}`, width);
    const style = isSelected ? NAV_SELECTED_STYLE : DEFAULT_STYLE;

    if (i === 0 && hasMoreAbove) {
      rows.push(withIndicator(text, style, NAV_SCROLL_UP_GLYPH, width));
    } else if (i === visible - 1 && hasMoreBelow) {
      rows.push(withIndicator(text, style, NAV_SCROLL_DOWN_GLYPH, width));
    } else {
      rows.push(Object.freeze([styledRun(text, style)]));
    }
  }

  return Object.freeze({ rows: Object.freeze(rows), scrollOffset: offset, hasMoreAbove, hasMoreBelow });
}
