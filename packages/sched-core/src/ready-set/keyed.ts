// ---------------------------------------------------------------------------
// Ready set: binary min-heap keyed by a composite tuple
// ---------------------------------------------------------------------------
// Keys are derived once, when a handle is inserted: the fields they read
// (remaining time, vruntime) only change while a task is out of the heap.
// Equal keys come out in insertion order via a monotonically increasing
// sequence number, so every ordering is total and runs are reproducible.
// ---------------------------------------------------------------------------

import { invariant } from '../errors.js';
import type { ReadyKey, ReadySet, TaskHandle } from '../types.js';

type HeapEntry = {
  handle: TaskHandle;
  key: ReadyKey;
  seq: number;
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Lexicographic comparison; a shorter key that is a prefix sorts first. */
export function compareKeys(a: ReadyKey, b: ReadyKey): number {
  const len = Math.min(a.length, b.length);
  for (let i = 0; i < len; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    if (x !== y) return x < y ? -1 : 1;
  }
  return a.length - b.length;
}

function precedes(a: HeapEntry, b: HeapEntry): boolean {
  return (compareKeys(a.key, b.key) || a.seq - b.seq) < 0;
}

/** Move `entry` from slot `hole` towards the root, shifting larger parents down. */
function bubbleUp(entries: HeapEntry[], hole: number, entry: HeapEntry): void {
  let slot = hole;
  while (slot > 0) {
    const up = (slot - 1) >> 1;
    const parent = entries[up];
    if (!parent || !precedes(entry, parent)) break;
    entries[slot] = parent;
    slot = up;
  }
  entries[slot] = entry;
}

/** Move `entry` from slot `hole` towards the leaves, pulling the smaller child up. */
function bubbleDown(entries: HeapEntry[], hole: number, entry: HeapEntry): void {
  let slot = hole;
  for (;;) {
    let child = 2 * slot + 1;
    let next = entries[child];
    if (!next) break;
    const sibling = entries[child + 1];
    if (sibling && precedes(sibling, next)) {
      child += 1;
      next = sibling;
    }
    if (!precedes(next, entry)) break;
    entries[slot] = next;
    slot = child;
  }
  entries[slot] = entry;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Create a ready set ordered by `keyOf(handle)`, evaluated at insertion.
 */
export function createKeyedReadySet(keyOf: (handle: TaskHandle) => ReadyKey): ReadySet {
  const entries: HeapEntry[] = [];
  let nextSeq = 0;

  return {
    insert(handle) {
      const entry = { handle, key: keyOf(handle), seq: nextSeq++ };
      entries.push(entry);
      bubbleUp(entries, entries.length - 1, entry);
    },

    peek() {
      const top = entries[0];
      invariant(top, 'peek on an empty ready set');
      return top.handle;
    },

    pop() {
      const top = entries[0];
      invariant(top, 'pop on an empty ready set');
      const last = entries.pop();
      if (last && entries.length > 0) bubbleDown(entries, 0, last);
      return top.handle;
    },

    size() {
      return entries.length;
    },

    forEachExcept(handle, fn) {
      for (const entry of entries) {
        if (entry.handle !== handle) fn(entry.handle);
      }
    },
  };
}
