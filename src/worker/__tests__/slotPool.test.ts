import { describe, expect, it } from 'vitest';
import { createSlotPool } from '../slotPool';

describe('createSlotPool', () => {
  it('hands out at most capacity slots', () => {
    const pool = createSlotPool(2);
    expect(pool.tryAcquire()).toBe(true);
    expect(pool.tryAcquire()).toBe(true);
    expect(pool.tryAcquire()).toBe(false);
    expect(pool.inUse).toBe(2);
    expect(pool.available).toBe(0);

    pool.release();
    expect(pool.available).toBe(1);
    expect(pool.tryAcquire()).toBe(true);
  });

  it('shrinks without evicting held slots', () => {
    const pool = createSlotPool(3);
    pool.tryAcquire();
    pool.tryAcquire();
    pool.resize(1);

    expect(pool.capacity).toBe(1);
    expect(pool.inUse).toBe(2);
    expect(pool.tryAcquire()).toBe(false);
    pool.release();
    expect(pool.tryAcquire()).toBe(false);
    pool.release();
    expect(pool.tryAcquire()).toBe(true);
  });

  it('clamps capacity to at least one slot', () => {
    expect(createSlotPool(0).capacity).toBe(1);
    expect(createSlotPool(100).capacity).toBe(32);
  });

  it('rejects releasing a slot that was never acquired', () => {
    expect(() => createSlotPool(1).release()).toThrow('Slot released more times than acquired');
  });
});
