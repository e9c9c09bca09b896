import { assert, describe, test } from "@quadrant-tui/testkit";
import { TerminalTooSmallError } from "../../errors.js";
import { setRenderAuditSink } from "../../perf/renderAudit.js";
import { createTestSurface } from "../../testing/surface.js";
import { type DrawOp, applyDrawOps, compareDrawOps } from "../drawOps.js";
import { RenderCoordinator } from "../renderCoordinator.js";
import type { AppSnapshot } from "../snapshot.js";

const SIZE = Object.freeze({ rows: 60, cols: 120 });

const SNAPSHOT: AppSnapshot = Object.freeze({
  title: "Quadrant",
  author: "Ann",
  version: "1.0",
  navItems: ["Home", "Logs"],
  selectedIndex: 0,
  bodyText: "hello",
  status: "Ready",
});

function regionsOf(ops: readonly DrawOp[]): string[] {
  const out: string[] = [];
  for (const op of ops) {
    if (out[out.length - 1] !== op.region) out.push(op.region);
  }
  return out;
}

function firstRun(ops: readonly DrawOp[]): string | null {
  for (const op of ops) {
    if (op.op === "putRun") return op.run.text;
  }
  return null;
}

describe("RenderCoordinator - first frame", () => {
  test("draws every region in fixed order", () => {
    const coordinator = new RenderCoordinator(SIZE);
    const ops = coordinator.update(SNAPSHOT);
    assert.deepEqual(regionsOf(ops), ["top", "left", "main", "bottom"]);
    assert.deepEqual(ops[0], { region: "top", op: "clear", rect: { x: 0, y: 0, w: 120, h: 3 } });
  });

  test("ops inside a region run top-to-bottom, left-to-right after the clear", () => {
    const coordinator = new RenderCoordinator(SIZE);
    const ops = coordinator.update(SNAPSHOT);
    for (const region of ["top", "left", "main", "bottom"] as const) {
      const own = ops.filter((op) => op.region === region);
      assert.equal(own[0]?.op, "clear");
      const rest = own.slice(1);
      for (let i = 1; i < rest.length; i++) {
        const prev = rest[i - 1];
        const cur = rest[i];
        if (prev === undefined || cur === undefined) continue;
        assert.ok(compareDrawOps(prev, cur) <= 0);
      }
    }
  });

  test("renders frames and content onto a surface", () => {
    const coordinator = new RenderCoordinator(SIZE);
    const surface = createTestSurface(SIZE);
    applyDrawOps(surface, coordinator.update(SNAPSHOT));

    assert.equal(surface.rowText(0), `┌${"─".repeat(118)}┐`);
    assert.equal(surface.rowText(3), `┌${"─".repeat(28)}┐┌${"─".repeat(88)}┐`);
    assert.equal(surface.rowText(59), `└${"─".repeat(118)}┘`);

    // header centred in the 118-cell content row
    assert.equal(surface.rowText(1).slice(56, 64), "Quadrant");
    assert.equal(surface.rowText(1).slice(1, 56), " ".repeat(55));

    assert.equal(surface.rowText(4).slice(1, 9), "> . Home");
    assert.equal(surface.cellAt(4, 1)?.style.decoration, "reverse");
    assert.equal(surface.rowText(5).slice(1, 9), " 2. Logs");
    assert.equal(surface.cellAt(5, 1)?.style.decoration, "none");

    assert.equal(surface.rowText(4).slice(31, 36), "hello");
    assert.equal(surface.rowText(58).slice(1, 14), "Status: Ready");
  });

  test("an empty first update still frames every region", () => {
    const coordinator = new RenderCoordinator(SIZE);
    const surface = createTestSurface(SIZE);
    applyDrawOps(surface, coordinator.update());
    assert.equal(surface.rowText(4).slice(1, 9), "No items");
    assert.equal(surface.rowText(58).slice(1, 34), "Press Tab to switch to input mode");
  });

  test("too small terminals are rejected at construction", () => {
    assert.throws(() => new RenderCoordinator({ rows: 40, cols: 100 }), TerminalTooSmallError);
  });
});

describe("RenderCoordinator - incremental updates", () => {
  test("an unchanged snapshot yields no ops", () => {
    const coordinator = new RenderCoordinator(SIZE);
    coordinator.update(SNAPSHOT);
    assert.deepEqual(coordinator.update({ ...SNAPSHOT }), []);
  });

  test("only the region owning a changed field is redrawn", () => {
    const coordinator = new RenderCoordinator(SIZE);
    coordinator.update(SNAPSHOT);

    const body = coordinator.update({ ...SNAPSHOT, bodyText: "changed" });
    assert.deepEqual(regionsOf(body), ["main"]);
    assert.deepEqual(body[0], { region: "main", op: "clear", rect: { x: 30, y: 3, w: 90, h: 54 } });
    assert.equal(firstRun(body), "changed");

    const status = coordinator.update({ ...SNAPSHOT, bodyText: "changed", status: "Busy" });
    assert.deepEqual(regionsOf(status), ["bottom"]);

    const nav = coordinator.update({ ...SNAPSHOT, bodyText: "changed", status: "Busy", selectedIndex: 1 });
    assert.deepEqual(regionsOf(nav), ["left"]);
  });

  test("a body change of the same length reaches the main buffer", () => {
    const coordinator = new RenderCoordinator(SIZE);
    coordinator.update({ ...SNAPSHOT, bodyText: "ajvosh" });
    const ops = coordinator.update({ ...SNAPSHOT, bodyText: "bacaaa" });
    assert.equal(firstRun(ops), "bacaaa");
    assert.deepEqual(
      coordinator.buffer("main").contentLines().map((line) => line.map((r) => r.text).join("")),
      ["bacaaa"],
    );
  });

  test("a processing notice replaces the body until it is cleared", () => {
    const coordinator = new RenderCoordinator(SIZE);
    const mainText = (): string[] =>
      coordinator
        .buffer("main")
        .contentLines()
        .map((line) => line.map((r) => r.text).join(""));
    coordinator.update(SNAPSHOT);

    const ops = coordinator.update({ ...SNAPSHOT, processing: { message: "Indexing", progress: 0.5 } });
    assert.deepEqual(regionsOf(ops), ["main"]);
    assert.deepEqual(mainText(), [
      "Processing: Indexing",
      "",
      `Progress: [${"█".repeat(20)}${"░".repeat(20)}] 50%`,
      "",
      "Please wait while the operation completes...",
    ]);

    coordinator.update({ ...SNAPSHOT, bodyStatus: "Indexed" });
    assert.deepEqual(mainText(), ["[Status: Indexed]", "", "hello"]);
  });

  test("several changed groups redraw in region order", () => {
    const coordinator = new RenderCoordinator(SIZE);
    coordinator.update(SNAPSHOT);
    const ops = coordinator.update({ ...SNAPSHOT, status: "Busy", title: "Other" });
    assert.deepEqual(regionsOf(ops), ["top", "bottom"]);
  });

  test("out-of-range selection is clamped, not an error", () => {
    const coordinator = new RenderCoordinator(SIZE);
    const surface = createTestSurface(SIZE);
    applyDrawOps(surface, coordinator.update({ ...SNAPSHOT, selectedIndex: 42 }));
    assert.equal(surface.rowText(5).slice(1, 9), "> . Logs");
  });
});

describe("RenderCoordinator - main region", () => {
  test("appended lines redraw main and survive a full redraw", () => {
    const coordinator = new RenderCoordinator(SIZE);
    const surface = createTestSurface(SIZE);
    applyDrawOps(surface, coordinator.update(SNAPSHOT));

    coordinator.appendMain("world");
    assert.deepEqual(coordinator.dirtyRegions(), ["main"]);
    const ops = coordinator.update(SNAPSHOT);
    assert.deepEqual(regionsOf(ops), ["main"]);
    applyDrawOps(surface, ops);
    assert.equal(surface.rowText(5).slice(31, 36), "world");

    coordinator.invalidate();
    const full = coordinator.update(SNAPSHOT);
    assert.deepEqual(regionsOf(full), ["top", "left", "main", "bottom"]);
    assert.equal(coordinator.mainScrollInfo().totalLines, 2);
  });

  test("scrolling moves the viewport and redraws main", () => {
    const coordinator = new RenderCoordinator(SIZE);
    const body = Array.from({ length: 60 }, (_, i) => `l${i}`).join("\n");
    coordinator.update({ ...SNAPSHOT, bodyText: body });

    coordinator.scrollMain("down", 3);
    assert.deepEqual(coordinator.mainScrollInfo(), { offset: 3, totalLines: 60, viewportHeight: 52 });
    const ops = coordinator.update({ ...SNAPSHOT, bodyText: body });
    assert.deepEqual(regionsOf(ops), ["main"]);
    assert.equal(firstRun(ops), "l3");

    coordinator.scrollMain("up", 100);
    assert.equal(coordinator.mainScrollInfo().offset, 0);
  });

  test("clearMain empties the region", () => {
    const coordinator = new RenderCoordinator(SIZE);
    coordinator.update(SNAPSHOT);
    coordinator.clearMain();
    const ops = coordinator.update(SNAPSHOT);
    assert.deepEqual(regionsOf(ops), ["main"]);
    assert.equal(firstRun(ops), null);
    assert.equal(coordinator.buffer("main").lineCount, 0);
  });
});

describe("RenderCoordinator - resize and frame style", () => {
  test("resize lays out again and redraws everything", () => {
    const coordinator = new RenderCoordinator(SIZE);
    coordinator.update(SNAPSHOT);
    coordinator.resize({ rows: 80, cols: 200 });
    assert.deepEqual(coordinator.layout.main, { x: 50, y: 3, w: 150, h: 74 });
    assert.equal(coordinator.buffer("main").width, 148);
    assert.deepEqual(coordinator.dirtyRegions(), ["top", "left", "main", "bottom"]);
    assert.deepEqual(regionsOf(coordinator.update(SNAPSHOT)), ["top", "left", "main", "bottom"]);
  });

  test("a failed resize keeps the previous layout", () => {
    const coordinator = new RenderCoordinator(SIZE);
    coordinator.update(SNAPSHOT);
    assert.throws(() => coordinator.resize({ rows: 20, cols: 200 }), TerminalTooSmallError);
    assert.equal(coordinator.layout.terminalRows, 60);
    assert.deepEqual(coordinator.dirtyRegions(), []);
  });

  test("setFrameStyle redraws every border with the new glyphs", () => {
    const coordinator = new RenderCoordinator(SIZE, { frameStyle: "rounded" });
    coordinator.update(SNAPSHOT);
    assert.equal(coordinator.frameStyle, "rounded");
    coordinator.setFrameStyle("double");
    const ops = coordinator.update(SNAPSHOT);
    assert.deepEqual(regionsOf(ops), ["top", "left", "main", "bottom"]);
    const corner = ops.find((op) => op.op === "putChar");
    assert.equal(corner?.op === "putChar" ? corner.glyph : null, "╔");
  });

  test("an unrepresentable frame falls back without touching content", () => {
    const coordinator = new RenderCoordinator(SIZE);
    const surface = createTestSurface({ ...SIZE, rejectGlyphs: (g) => g.charCodeAt(0) > 0x7f });
    const report = applyDrawOps(surface, coordinator.update(SNAPSHOT));
    assert.equal(report.framesDegraded.length, 4);
    assert.equal(surface.rowText(0), `+${"-".repeat(118)}+`);
    assert.equal(surface.rowText(4).slice(31, 36), "hello");
  });
});

describe("RenderCoordinator - audit", () => {
  test("each update that draws is recorded", () => {
    const lines: string[] = [];
    const coordinator = new RenderCoordinator(SIZE);
    setRenderAuditSink((line) => lines.push(line));
    try {
      coordinator.update(SNAPSHOT);
      coordinator.update(SNAPSHOT);
    } finally {
      setRenderAuditSink(null);
    }
    assert.equal(lines.length, 1);
    const record: unknown = JSON.parse(lines[0] ?? "null");
    assert.ok(typeof record === "object" && record !== null);
    assert.equal(Reflect.get(record, "scope"), "coordinator");
    assert.equal(Reflect.get(record, "dirty"), "top,left,main,bottom");
  });
});
