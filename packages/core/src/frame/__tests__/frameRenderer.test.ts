import { assert, describe, test } from "@quadrant-tui/testkit";
import { createTestSurface } from "../../testing/surface.js";
import { DEFAULT_STYLE } from "../../text/style.js";
import { BorderWriter, border, contentArea, drawFrame } from "../frameRenderer.js";
import { FRAME_GLYPHS, isFrameStyle, readFrameStyle } from "../glyphs.js";

const nonAscii = (glyph: string): boolean => glyph.charCodeAt(0) > 0x7f;

describe("border", () => {
  test("3x3 outline, row-major", () => {
    const cells = border({ x: 0, y: 0, w: 3, h: 3 }, "single");
    assert.deepEqual(
      cells.map((c) => [c.row, c.col, c.glyph]),
      [
        [0, 0, "┌"],
        [0, 1, "─"],
        [0, 2, "┐"],
        [1, 0, "│"],
        [1, 2, "│"],
        [2, 0, "└"],
        [2, 1, "─"],
        [2, 2, "┘"],
      ],
    );
  });

  test("offset rects and other styles", () => {
    const cells = border({ x: 5, y: 2, w: 4, h: 3 }, "double");
    assert.equal(cells.length, 10);
    assert.deepEqual(cells[0], { row: 2, col: 5, role: "topLeft", glyph: "╔" });
    assert.deepEqual(cells[cells.length - 1], { row: 4, col: 8, role: "bottomRight", glyph: "╝" });
  });

  test("empty when either side is below 3", () => {
    assert.deepEqual(border({ x: 0, y: 0, w: 2, h: 10 }, "single"), []);
    assert.deepEqual(border({ x: 0, y: 0, w: 10, h: 2 }, "single"), []);
  });

  test("contentArea shrinks by one cell per side and clamps", () => {
    assert.deepEqual(contentArea({ x: 30, y: 3, w: 90, h: 54 }), { x: 31, y: 4, w: 88, h: 52 });
    assert.deepEqual(contentArea({ x: 0, y: 0, w: 2, h: 5 }), { x: 1, y: 1, w: 0, h: 3 });
    assert.deepEqual(contentArea({ x: 0, y: 0, w: 1, h: 1 }), { x: 1, y: 1, w: 0, h: 0 });
  });
});

describe("frame styles", () => {
  test("readFrameStyle falls back to single", () => {
    assert.equal(readFrameStyle("rounded"), "rounded");
    assert.equal(readFrameStyle("dotted"), "single");
    assert.equal(readFrameStyle(undefined), "single");
    assert.equal(isFrameStyle("thick"), true);
  });

  test("rounded corners", () => {
    assert.equal(FRAME_GLYPHS.rounded.topLeft, "╭");
    assert.equal(FRAME_GLYPHS.thick.horizontal, "━");
  });
});

describe("drawFrame", () => {
  test("draws primary glyphs", () => {
    const surface = createTestSurface({ rows: 3, cols: 4 });
    const outcome = drawFrame(surface, { x: 0, y: 0, w: 4, h: 3 }, "single");
    assert.equal(outcome, "primary");
    assert.equal(surface.toText(), "┌──┐\n│  │\n└──┘");
  });

  test("falls back to ASCII when a glyph is rejected", () => {
    const surface = createTestSurface({ rows: 3, cols: 4, rejectGlyphs: nonAscii });
    const outcome = drawFrame(surface, { x: 0, y: 0, w: 4, h: 3 }, "double");
    assert.equal(outcome, "ascii");
    assert.equal(surface.toText(), "+--+\n|  |\n+--+");
  });

  test("reports omitted when ASCII fails too", () => {
    const surface = createTestSurface({ rows: 3, cols: 4, rejectGlyphs: () => true });
    assert.equal(drawFrame(surface, { x: 0, y: 0, w: 4, h: 3 }), "omitted");
    assert.equal(surface.toText(), "\n\n");
  });

  test("a partly off-screen frame degrades without throwing", () => {
    const surface = createTestSurface({ rows: 2, cols: 4 });
    assert.equal(drawFrame(surface, { x: 0, y: 0, w: 4, h: 3 }), "omitted");
    assert.equal(surface.rowText(0), "+--+");
    assert.equal(surface.rowText(1), "|  |");
  });

  test("nothing to draw for a tiny rect", () => {
    const surface = createTestSurface({ rows: 3, cols: 4 });
    assert.equal(drawFrame(surface, { x: 0, y: 0, w: 2, h: 2 }), "skipped");
    assert.equal(surface.calls.length, 0);
  });
});

describe("BorderWriter", () => {
  test("a mid-border rejection redraws the placed cells in ASCII", () => {
    const surface = createTestSurface({ rows: 3, cols: 4, rejectGlyphs: ["┐"] });
    const writer = new BorderWriter(surface);
    for (const c of border({ x: 0, y: 0, w: 4, h: 3 }, "single")) writer.put(c, DEFAULT_STYLE);

    assert.equal(writer.mode, "ascii");
    assert.equal(surface.toText(), "+--+\n|  |\n+--+");
    // three primary cells, four ASCII redraws, six ASCII cells after the switch
    assert.equal(writer.cellsWritten, 13);
  });

  test("stops writing once the border is omitted", () => {
    const surface = createTestSurface({ rows: 3, cols: 4, rejectGlyphs: () => true });
    const writer = new BorderWriter(surface);
    const cells = border({ x: 0, y: 0, w: 4, h: 3 }, "single");
    for (const c of cells) writer.put(c, DEFAULT_STYLE);

    assert.equal(writer.mode, "omitted");
    assert.equal(writer.cellsWritten, 0);
    assert.equal(surface.calls.length, 2);
  });
});
