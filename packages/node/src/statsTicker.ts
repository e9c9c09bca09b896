/**
 * packages/node/src/statsTicker.ts — Background statistics writer.
 *
 * The ticker is the only writer of its snapshot store. Each tick samples the
 * host (optionally async), then swaps in a new statistics value with the
 * uptime recomputed. The render loop only ever reads the store.
 *
 * `stop(timeoutMs)` waits a bounded time for an in-flight sample; a sample
 * that finishes after stop() was called is discarded, so no write lands once
 * the returned promise resolves.
 */

import { type AppStatistics, type SnapshotStore, emitRenderAudit } from "@quadrant-tui/core";

export type StatsSample = Partial<Omit<AppStatistics, "uptimeSec">>;

export type StatsTickerOptions = Readonly<{
  store: SnapshotStore<AppStatistics>;
  /** Default: 1000. */
  intervalMs?: number;
  /** Default wait for `stop()`. Default: 250. */
  stopTimeoutMs?: number;
  /** Clock used for uptime. Default: Date.now. */
  now?: () => number;
  /** Uptime origin. Default: now() at creation. */
  startedAtMs?: number;
  sample?: () => StatsSample | Promise<StatsSample>;
  /** Called when a sample throws or rejects. The tick is skipped. Errors it throws are audited, not rethrown. */
  onError?: (error: unknown) => void;
}>;

export type StatsTickerStopResult = "drained" | "timedOut";

export type StatsTicker = Readonly<{
  start: () => void;
  /** Run one tick immediately. Resolves once its write landed or was discarded. */
  tick: () => Promise<void>;
  stop: (timeoutMs?: number) => Promise<StatsTickerStopResult>;
  isRunning: () => boolean;
}>;

export const DEFAULT_STATS_INTERVAL_MS = 1000;
export const DEFAULT_STATS_STOP_TIMEOUT_MS = 250;

function sanitizeInterval(ms: number | undefined): number {
  if (ms === undefined || !Number.isFinite(ms) || ms <= 0) return DEFAULT_STATS_INTERVAL_MS;
  return Math.max(1, Math.floor(ms));
}

export function createStatsTicker(opts: StatsTickerOptions): StatsTicker {
  const now = opts.now ?? Date.now;
  const startedAt = opts.startedAtMs ?? now();
  const intervalMs = sanitizeInterval(opts.intervalMs);
  let timer: ReturnType<typeof setInterval> | null = null;
  let stopped = false;
  let inFlight: Promise<void> | null = null;

  const write = (sample: StatsSample): void => {
    if (stopped) return;
    const uptimeSec = Math.max(0, Math.floor((now() - startedAt) / 1000));
    opts.store.update((prev) => ({ ...prev, ...sample, uptimeSec }));
  };

  // A throwing onError must not turn an interval tick into an unhandled rejection.
  const reportError = (error: unknown): void => {
    try {
      opts.onError?.(error);
    } catch (hookError: unknown) {
      emitRenderAudit("ticker", "onErrorThrew", {
        error: error instanceof Error ? error.message : String(error),
        hookError: hookError instanceof Error ? hookError.message : String(hookError),
      });
    }
  };

  const runTick = async (): Promise<void> => {
    try {
      const sample = opts.sample ? await opts.sample() : {};
      write(sample);
    } catch (error: unknown) {
      reportError(error);
    }
  };

  const tick = (): Promise<void> => {
    if (stopped) return Promise.resolve();
    if (inFlight !== null) return inFlight;
    const p = runTick().finally(() => {
      if (inFlight === p) inFlight = null;
    });
    inFlight = p;
    return p;
  };

  const start = (): void => {
    if (stopped || timer !== null) return;
    timer = setInterval(() => {
      void tick();
    }, intervalMs);
    timer.unref();
  };

  const stop = async (
    timeoutMs: number = opts.stopTimeoutMs ?? DEFAULT_STATS_STOP_TIMEOUT_MS,
  ): Promise<StatsTickerStopResult> => {
    stopped = true;
    if (timer !== null) {
      clearInterval(timer);
      timer = null;
    }

    const pending = inFlight;
    let result: StatsTickerStopResult = "drained";
    if (pending !== null) {
      result = await new Promise<StatsTickerStopResult>((resolve) => {
        const timeout = setTimeout(() => resolve("timedOut"), Math.max(0, timeoutMs));
        void pending.then(() => {
          clearTimeout(timeout);
          resolve("drained");
        });
      });
    }

    emitRenderAudit("ticker", "stop", { result });
    return result;
  };

  return Object.freeze({
    start,
    tick,
    stop,
    isRunning: () => timer !== null,
  });
}
