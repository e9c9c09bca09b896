/**
 * packages/core/src/layout/textMeasure.ts — Code-point text measurement.
 *
 * Width rules:
 *   - every Unicode scalar value occupies 1 cell
 *   - unpaired UTF-16 surrogates count as 1 cell (drawn as U+FFFD)
 *
 * Grapheme clusters and East Asian widths are not modelled; a
 * wide glyph may overflow by one cell on terminals that render it double.
 */

/** Display width of `text` in terminal cells. */
export function measureTextCells(text: string): number {
  let cells = 0;
  for (let i = 0; i < text.length; i++) {
    const a = text.charCodeAt(i);
    if (a >= 0xd800 && a <= 0xdbff) {
      const b = text.charCodeAt(i + 1);
      if (b >= 0xdc00 && b <= 0xdfff) i++;
    }
    cells++;
  }
  return cells;
}

/** Split `text` into scalar values (one cell each). */
export function splitCells(text: string): string[] {
  return Array.from(text);
}

/**
 * Split `text` at `cells`, returning the head that fits and the rest.
 * Never splits a surrogate pair.
 */
export function splitAtCells(text: string, cells: number): readonly [string, string] {
  if (cells <= 0) return ["", text];
  let off = 0;
  let taken = 0;
  while (off < text.length && taken < cells) {
    const a = text.charCodeAt(off);
    if (a >= 0xd800 && a <= 0xdbff) {
      const b = text.charCodeAt(off + 1);
      off += b >= 0xdc00 && b <= 0xdfff ? 2 : 1;
    } else {
      off++;
    }
    taken++;
  }
  return [text.slice(0, off), text.slice(off)];
}

/**
 * Truncate text to fit within maxWidth cells, appending "..." if needed.
 * Returns original text if it fits.
 */
export function truncateWithEllipsis(text: string, maxWidth: number): string {
  const fullWidth = measureTextCells(text);
  if (fullWidth <= maxWidth) return text;
  if (maxWidth <= 0) return "";
  if (maxWidth <= 3) return ".".repeat(maxWidth);
  const [head] = splitAtCells(text, maxWidth - 3);
  return `${head}...`;
}

/** Keep the last `maxWidth` cells of `text`. */
export function takeTailCells(text: string, maxWidth: number): string {
  if (maxWidth <= 0) return "";
  const cells = splitCells(text);
  if (cells.length <= maxWidth) return text;
  return cells.slice(cells.length - maxWidth).join("");
}

/** Right-pad `text` with spaces up to `width` cells; longer text is returned unchanged. */
export function padEndCells(text: string, width: number): string {
  const w = measureTextCells(text);
  if (w >= width) return text;
  return text + " ".repeat(width - w);
}

/** True for C0 controls and DEL, which must never reach the terminal verbatim. */
export function isControlChar(ch: string): boolean {
  const code = ch.charCodeAt(0);
  return code < 0x20 || code === 0x7f;
}
