import { assert, createRng, describe, test } from "@quadrant-tui/testkit";
import { QuadrantError, TerminalTooSmallError } from "../../errors.js";
import { rectArea, rectWithin, rectsOverlap } from "../geometry.js";
import {
  computeLayout,
  detectSizeChange,
  getMinimumTerminalSize,
  getRegionMinimumSize,
  layoutRegion,
  resolveLayoutConfig,
  tryComputeLayout,
  validateTerminalSize,
} from "../layoutEngine.js";
import { REGION_ORDER } from "../types.js";

describe("computeLayout - geometry", () => {
  test("60x120 splits into header, sidebar, main and footer", () => {
    const plan = computeLayout(60, 120);
    assert.deepEqual(plan.top, { x: 0, y: 0, w: 120, h: 3 });
    assert.deepEqual(plan.left, { x: 0, y: 3, w: 30, h: 54 });
    assert.deepEqual(plan.main, { x: 30, y: 3, w: 90, h: 54 });
    assert.deepEqual(plan.bottom, { x: 0, y: 57, w: 120, h: 3 });
    assert.equal(plan.terminalRows, 60);
    assert.equal(plan.terminalCols, 120);
  });

  test("sidebar is a quarter of the width once that exceeds 25", () => {
    const plan = computeLayout(80, 200);
    assert.equal(plan.left.w, 50);
    assert.equal(plan.main.x, 50);
    assert.equal(plan.main.w, 150);
  });

  test("regions tile the terminal without overlap", () => {
    for (const [rows, cols] of [
      [60, 120],
      [61, 121],
      [99, 333],
    ] as const) {
      const plan = computeLayout(rows, cols);
      let area = 0;
      for (const id of REGION_ORDER) {
        const rect = layoutRegion(plan, id);
        assert.equal(rectWithin(rect, { rows, cols }), true);
        area += rect.w * rect.h;
        for (const other of REGION_ORDER) {
          if (other !== id) assert.equal(rectsOverlap(rect, layoutRegion(plan, other)), false);
        }
      }
      assert.equal(area, rows * cols);
    }
  });

  test("seeded sweep: tiling, region minimums and main dominance", () => {
    const rng = createRng(60120);
    for (let iter = 0; iter < 500; iter++) {
      const rows = rng.int(60, 300);
      const cols = rng.int(120, 500);
      const plan = computeLayout(rows, cols);
      const at = `${rows}x${cols}`;

      for (const id of REGION_ORDER) {
        const rect = layoutRegion(plan, id);
        const min = getRegionMinimumSize(id);
        assert.ok(rectWithin(rect, { rows, cols }), `${id} outside terminal at ${at}`);
        assert.ok(rect.h >= min.rows && rect.w >= min.cols, `${id} below minimum at ${at}`);
        for (const other of REGION_ORDER) {
          if (other !== id) {
            assert.equal(rectsOverlap(rect, layoutRegion(plan, other)), false, `${id}/${other} at ${at}`);
          }
        }
      }

      const main = rectArea(plan.main);
      assert.ok(main > rectArea(plan.top), `main vs top at ${at}`);
      assert.ok(main > rectArea(plan.left), `main vs left at ${at}`);
      assert.ok(main > rectArea(plan.bottom), `main vs bottom at ${at}`);
      assert.ok(main > rectArea(plan.top) + rectArea(plan.bottom), `main vs header+footer at ${at}`);
    }
  });

  test("plans are frozen and deterministic", () => {
    const a = computeLayout(70, 150);
    const b = computeLayout(70, 150);
    assert.deepEqual(a, b);
    assert.equal(Object.isFrozen(a), true);
    assert.equal(Object.isFrozen(a.main), true);
  });
});

describe("computeLayout - too small", () => {
  test("rows below minimum throws with both sizes", () => {
    assert.throws(
      () => computeLayout(59, 120),
      (error: unknown) => {
        assert.ok(error instanceof TerminalTooSmallError);
        assert.equal(error.code, "QUAD_TERMINAL_TOO_SMALL");
        assert.deepEqual(error.current, { rows: 59, cols: 120 });
        assert.deepEqual(error.minimum, { rows: 60, cols: 120 });
        assert.equal(error.message, "Terminal size 59x120 is below minimum requirement 60x120");
        return true;
      },
    );
  });

  test("cols below minimum throws", () => {
    assert.throws(() => computeLayout(60, 119), TerminalTooSmallError);
  });

  test("tryComputeLayout returns the error as a value", () => {
    const res = tryComputeLayout(10, 10);
    assert.equal(res.ok, false);
    if (res.ok) return;
    assert.deepEqual(res.error.current, { rows: 10, cols: 10 });
  });

  test("a region below its own minimum fails under a relaxed terminal minimum", () => {
    const config = { minTerminal: { rows: 10, cols: 40 } };
    const res = tryComputeLayout(20, 100, config);
    assert.equal(res.ok, false);
    if (res.ok) return;
    assert.deepEqual(res.error.minimum, { rows: 10, cols: 40 });
    assert.equal(tryComputeLayout(21, 100, config).ok, true);
  });
});

describe("layout queries", () => {
  test("minimum sizes", () => {
    assert.deepEqual(getMinimumTerminalSize(), { rows: 60, cols: 120 });
    assert.deepEqual(getRegionMinimumSize("top"), { rows: 3, cols: 30 });
    assert.deepEqual(getRegionMinimumSize("left"), { rows: 15, cols: 25 });
    assert.deepEqual(getRegionMinimumSize("main"), { rows: 15, cols: 50 });
    assert.deepEqual(getRegionMinimumSize("bottom"), { rows: 3, cols: 30 });
  });

  test("validateTerminalSize", () => {
    assert.equal(validateTerminalSize(60, 120), true);
    assert.equal(validateTerminalSize(59, 500), false);
    assert.equal(validateTerminalSize(500, 119), false);
  });

  test("detectSizeChange compares against the plan's terminal size", () => {
    const plan = computeLayout(60, 120);
    assert.equal(detectSizeChange(null, 60, 120), true);
    assert.equal(detectSizeChange(plan, 60, 120), false);
    assert.equal(detectSizeChange(plan, 61, 120), true);
    assert.equal(detectSizeChange(plan, 60, 121), true);
  });
});

describe("resolveLayoutConfig", () => {
  test("undefined yields the defaults", () => {
    const cfg = resolveLayoutConfig(undefined);
    assert.equal(cfg.headerRows, 3);
    assert.equal(cfg.footerRows, 3);
    assert.equal(cfg.sidebarMinCols, 25);
    assert.equal(cfg.sidebarDivisor, 4);
  });

  test("custom header and footer heights shape the plan", () => {
    const plan = computeLayout(60, 120, { headerRows: 4, footerRows: 5 });
    assert.deepEqual(plan.top, { x: 0, y: 0, w: 120, h: 4 });
    assert.deepEqual(plan.left, { x: 0, y: 4, w: 30, h: 51 });
    assert.deepEqual(plan.bottom, { x: 0, y: 55, w: 120, h: 5 });
  });

  test("non-positive values are rejected", () => {
    assert.throws(
      () => resolveLayoutConfig({ headerRows: 0 }),
      (error: unknown) => {
        assert.ok(error instanceof QuadrantError);
        assert.equal(error.code, "QUAD_INVALID_PROPS");
        assert.equal(error.message, "headerRows must be a positive integer");
        return true;
      },
    );
    assert.throws(() => resolveLayoutConfig({ minTerminal: { rows: 1.5, cols: 10 } }), QuadrantError);
  });
});
