/**
 * packages/core/src/frame/glyphs.ts — Border glyph tables.
 *
 * Frame styles are plain tags; the glyphs live in lookup tables keyed by tag.
 */

export type FrameStyle = "single" | "double" | "thick" | "rounded";

export type FrameGlyphRole =
  | "horizontal"
  | "vertical"
  | "topLeft"
  | "topRight"
  | "bottomLeft"
  | "bottomRight";

export type FrameGlyphSet = Readonly<Record<FrameGlyphRole, string>>;

export const DEFAULT_FRAME_STYLE: FrameStyle = "single";

export const FRAME_GLYPHS: Readonly<Record<FrameStyle, FrameGlyphSet>> = Object.freeze({
  single: Object.freeze({
    horizontal: "─",
    vertical: "│",
    topLeft: "┌",
    topRight: "┐",
    bottomLeft: "└",
    bottomRight: "┘",
  }),
  double: Object.freeze({
    horizontal: "═",
    vertical: "║",
    topLeft: "╔",
    topRight: "╗",
    bottomLeft: "╚",
    bottomRight: "╝",
  }),
  thick: Object.freeze({
    horizontal: "━",
    vertical: "┃",
    topLeft: "┏",
    topRight: "┓",
    bottomLeft: "┗",
    bottomRight: "┛",
  }),
  rounded: Object.freeze({
    horizontal: "─",
    vertical: "│",
    topLeft: "╭",
    topRight: "╮",
    bottomLeft: "╰",
    bottomRight: "╯",
  }),
});

/** Used when the terminal cannot draw box-drawing characters. */
export const ASCII_FRAME_GLYPHS: FrameGlyphSet = Object.freeze({
  horizontal: "-",
  vertical: "|",
  topLeft: "+",
  topRight: "+",
  bottomLeft: "+",
  bottomRight: "+",
});

export function isFrameStyle(v: unknown): v is FrameStyle {
  return v === "single" || v === "double" || v === "thick" || v === "rounded";
}

/**
 * Read and validate a frame style value.
 * Returns "single" as default for invalid values.
 */
export function readFrameStyle(v: unknown): FrameStyle {
  if (isFrameStyle(v)) return v;
  return DEFAULT_FRAME_STYLE;
}

export function getFrameGlyphs(style: FrameStyle): FrameGlyphSet {
  return FRAME_GLYPHS[style];
}
