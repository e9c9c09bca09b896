/**
 * packages/core/src/perf/renderAudit.ts — Optional render audit logging.
 *
 * Purpose:
 * - Emit lightweight NDJSON records at layout, update and frame-fallback points.
 * - Stay silent unless explicitly enabled.
 *
 * Enable with:
 *   QUADRANT_RENDER_AUDIT=1
 *
 * A host may also install a sink, which receives every line and turns
 * auditing on regardless of the environment.
 */

export type RenderAuditFields = Readonly<Record<string, unknown>>;
export type RenderAuditSink = (line: string) => void;

function envFlag(name: "QUADRANT_RENDER_AUDIT"): boolean {
  try {
    const g = globalThis as {
      process?: { env?: { QUADRANT_RENDER_AUDIT?: string } };
    };
    const raw = g.process?.env?.[name];
    if (raw === undefined) return false;
    const value = raw.trim().toLowerCase();
    return value === "1" || value === "true" || value === "yes" || value === "on";
  } catch {
    return false;
  }
}

function nowMs(): number {
  try {
    const g = globalThis as { performance?: { now?: () => number } };
    const fn = g.performance?.now;
    if (typeof fn === "function") return fn.call(g.performance);
  } catch {
    // no-op
  }
  return Date.now();
}

export const RENDER_AUDIT_ENABLED = envFlag("QUADRANT_RENDER_AUDIT");

let auditSink: RenderAuditSink | null = null;

/** Route audit lines to `sink` (or back to stderr with `null`). */
export function setRenderAuditSink(sink: RenderAuditSink | null): void {
  auditSink = sink;
}

export function isRenderAuditEnabled(): boolean {
  return RENDER_AUDIT_ENABLED || auditSink !== null;
}

export function emitRenderAudit(scope: string, stage: string, fields: RenderAuditFields): void {
  if (!isRenderAuditEnabled()) return;
  try {
    const g = globalThis as {
      process?: { pid?: number; stderr?: { write?: (text: string) => void } };
      console?: { error?: (msg?: unknown) => void };
    };
    const pid = g.process?.pid;
    const line = JSON.stringify({
      ts: new Date().toISOString(),
      tMs: nowMs(),
      pid: typeof pid === "number" && Number.isInteger(pid) ? pid : undefined,
      layer: "core",
      scope,
      stage,
      ...fields,
    });
    if (auditSink !== null) {
      auditSink(line);
      return;
    }
    if (typeof g.process?.stderr?.write === "function") {
      g.process.stderr.write(`${line}\n`);
      return;
    }
    g.console?.error?.(line);
  } catch {
    // Never break rendering due to optional diagnostics.
  }
}
