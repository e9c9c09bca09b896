/**
 * packages/core/src/render/dirtyTracker.ts — Per-region redraw state machine.
 *
 *   clean --markDirty--> dirty --markRendered--> rendered --commit--> clean
 *
 * `commit()` also returns regions that were marked dirty but never rendered to
 * clean, so a region whose redraw was skipped cannot retry forever.
 */

import { REGION_ORDER, type RegionId } from "../layout/types.js";

export type RegionRenderState = "clean" | "dirty" | "rendered";

export class DirtyTracker {
  private readonly states = new Map<RegionId, RegionRenderState>();

  constructor() {
    for (const id of REGION_ORDER) this.states.set(id, "clean");
  }

  state(id: RegionId): RegionRenderState {
    return this.states.get(id) ?? "clean";
  }

  /** Marking a rendered region dirty again queues another redraw. */
  markDirty(id: RegionId): void {
    this.states.set(id, "dirty");
  }

  markAllDirty(): void {
    for (const id of REGION_ORDER) this.states.set(id, "dirty");
  }

  /** Only a dirty region can become rendered; returns whether it did. */
  markRendered(id: RegionId): boolean {
    if (this.state(id) !== "dirty") return false;
    this.states.set(id, "rendered");
    return true;
  }

  /** Close the frame: every region returns to clean. */
  commit(): readonly RegionId[] {
    const rendered: RegionId[] = [];
    for (const id of REGION_ORDER) {
      if (this.state(id) === "rendered") rendered.push(id);
      this.states.set(id, "clean");
    }
    return Object.freeze(rendered);
  }

  isDirty(id: RegionId): boolean {
    return this.state(id) === "dirty";
  }

  /** Dirty regions in redraw order. */
  dirtyRegions(): readonly RegionId[] {
    return Object.freeze(REGION_ORDER.filter((id) => this.state(id) === "dirty"));
  }

  isClean(): boolean {
    return REGION_ORDER.every((id) => this.state(id) === "clean");
  }
}
