import { assert, describe, test } from "@quadrant-tui/testkit";
import { emitRenderAudit, isRenderAuditEnabled, setRenderAuditSink } from "../renderAudit.js";

describe("render audit", () => {
  test("a sink receives one NDJSON record per event", () => {
    const lines: string[] = [];
    setRenderAuditSink((line) => lines.push(line));
    try {
      assert.equal(isRenderAuditEnabled(), true);
      emitRenderAudit("layout", "computed", { rows: 60, cols: 120 });
    } finally {
      setRenderAuditSink(null);
    }
    assert.equal(lines.length, 1);
    const record: unknown = JSON.parse(lines[0] ?? "null");
    assert.ok(typeof record === "object" && record !== null);
    assert.equal(Reflect.get(record, "scope"), "layout");
    assert.equal(Reflect.get(record, "stage"), "computed");
    assert.equal(Reflect.get(record, "rows"), 60);
    assert.equal(Reflect.get(record, "cols"), 120);
    assert.equal(typeof Reflect.get(record, "ts"), "string");
  });

  test("a throwing sink never reaches the caller", () => {
    setRenderAuditSink(() => {
      throw new Error("sink down");
    });
    try {
      assert.doesNotThrow(() => emitRenderAudit("coordinator", "update", {}));
    } finally {
      setRenderAuditSink(null);
    }
  });
});
