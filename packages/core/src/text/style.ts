/**
 * packages/core/src/text/style.ts — Text styling types and helpers.
 *
 * Styles are tagged variants rather than attribute bitmasks so that the
 * surface adapter owns the mapping to terminal attributes.
 */

import { measureTextCells } from "../layout/textMeasure.js";

export type FontWeight = "normal" | "bold" | "dim";
export type TextDecoration = "none" | "underline" | "blink" | "reverse";

/** The eight basic terminal colors plus the terminal's own default. */
export type Color =
  | "default"
  | "black"
  | "red"
  | "green"
  | "yellow"
  | "blue"
  | "magenta"
  | "cyan"
  | "white";

export const COLORS: readonly Color[] = Object.freeze([
  "default",
  "black",
  "red",
  "green",
  "yellow",
  "blue",
  "magenta",
  "cyan",
  "white",
]);

export type Style = Readonly<{
  weight: FontWeight;
  decoration: TextDecoration;
  fg: Color;
  bg: Color;
}>;

/** A contiguous text fragment with one style. */
export type StyledRun = Readonly<{ text: string; style: Style }>;

/** One wrapped line; total width never exceeds the width it was wrapped at. */
export type StyledLine = readonly StyledRun[];

export const DEFAULT_STYLE: Style = Object.freeze({
  weight: "normal",
  decoration: "none",
  fg: "default",
  bg: "default",
});

export function isColor(v: unknown): v is Color {
  return typeof v === "string" && (COLORS as readonly string[]).includes(v);
}

export function createStyle(partial?: Partial<Style>): Style {
  if (!partial) return DEFAULT_STYLE;
  return Object.freeze({
    weight: partial.weight ?? DEFAULT_STYLE.weight,
    decoration: partial.decoration ?? DEFAULT_STYLE.decoration,
    fg: partial.fg ?? DEFAULT_STYLE.fg,
    bg: partial.bg ?? DEFAULT_STYLE.bg,
  });
}

export function styledRun(text: string, style: Style = DEFAULT_STYLE): StyledRun {
  return Object.freeze({ text, style });
}

export function styleEquals(a: Style, b: Style): boolean {
  return a.weight === b.weight && a.decoration === b.decoration && a.fg === b.fg && a.bg === b.bg;
}

export function lineWidth(line: StyledLine): number {
  let w = 0;
  for (const run of line) w += measureTextCells(run.text);
  return w;
}

export function lineText(line: StyledLine): string {
  let out = "";
  for (const run of line) out += run.text;
  return out;
}
