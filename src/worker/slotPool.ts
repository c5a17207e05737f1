import { clampInt } from '../lib/config';

export type SlotPool = {
  tryAcquire(): boolean;
  release(): void;
  /** Changes capacity; slots already held are kept until released. */
  resize(capacity: number): void;
  readonly capacity: number;
  readonly inUse: number;
  readonly available: number;
};

const MAX_SLOTS = 32;

export function createSlotPool(initialCapacity: number): SlotPool {
  let capacity = clampInt(initialCapacity, 1, MAX_SLOTS);
  let active = 0;

  return {
    tryAcquire() {
      if (active >= capacity) return false;
      active += 1;
      return true;
    },
    release() {
      if (active === 0) throw new Error('Slot released more times than acquired');
      active -= 1;
    },
    resize(next: number) {
      capacity = clampInt(next, 1, MAX_SLOTS);
    },
    get capacity() {
      return capacity;
    },
    get inUse() {
      return active;
    },
    get available() {
      return Math.max(0, capacity - active);
    },
  };
}
