import { invariant } from '../errors.js';
import type { ReadySet, TaskHandle } from '../types.js';

/** Compact the backing array once this many popped slots have built up. */
const COMPACT_THRESHOLD = 64;

/**
 * Strict FIFO ready set. Pops advance a head offset so that dequeuing stays
 * O(1); the dead prefix is dropped once it outgrows the live part.
 */
export function createFifoReadySet(): ReadySet {
  let items: TaskHandle[] = [];
  let head = 0;

  return {
    insert(handle) {
      items.push(handle);
    },

    peek() {
      const first = items[head];
      invariant(first !== undefined, 'peek on an empty ready set');
      return first;
    },

    pop() {
      const first = items[head];
      invariant(first !== undefined, 'pop on an empty ready set');
      head++;
      if (head >= COMPACT_THRESHOLD && head * 2 >= items.length) {
        items = items.slice(head);
        head = 0;
      }
      return first;
    },

    size() {
      return items.length - head;
    },

    forEachExcept(handle, fn) {
      for (let i = head; i < items.length; i++) {
        const item = items[i];
        if (item !== undefined && item !== handle) fn(item);
      }
    },
  };
}
