/**
 * packages/core/src/state/snapshotStore.ts — Immutable-swap value store.
 *
 * Shares state between a background writer (the statistics ticker) and the
 * render loop. The store only ever holds a complete frozen value: `update`
 * builds the next value from the previous one and swaps it in, so `read()`
 * can never observe a partially written snapshot.
 *
 * Only the owning writer calls `update` / `replace`; readers take `read()`
 * once per frame and treat the value as a copy.
 */

export type SnapshotStore<T extends object> = Readonly<{
  read: () => Readonly<T>;
  update: (fn: (prev: Readonly<T>) => T) => Readonly<T>;
  replace: (next: T) => Readonly<T>;
  /** Bumped on every swap that changed the value's identity. */
  version: () => number;
}>;

function freezeValue<T extends object>(value: T): Readonly<T> {
  return Object.isFrozen(value) ? value : Object.freeze({ ...value });
}

export function createSnapshotStore<T extends object>(initial: T): SnapshotStore<T> {
  let current: Readonly<T> = freezeValue(initial);
  let version = 0;

  const swap = (next: T): Readonly<T> => {
    if (next === current) return current;
    current = freezeValue(next);
    version++;
    return current;
  };

  return Object.freeze({
    read: () => current,
    update: (fn: (prev: Readonly<T>) => T) => swap(fn(current)),
    replace: (next: T) => swap(next),
    version: () => version,
  });
}
