import { describe, it, expect } from 'vitest';
import { Cells, grow } from './cells.js';
import { AllocationError } from './errors.js';

describe('Cells', () => {
  it('starts as a single zero cell at position 0', () => {
    const cells = new Cells();
    expect(cells.size).toBe(1);
    expect(cells.low).toBe(0);
    expect(cells.high).toBe(0);
    expect(cells.get(0)).toBe(0);
  });

  it('allocates a zero neighbour on the first step past either end', () => {
    const cells = new Cells();
    expect(grow(cells.advance(0))).toBe(1);
    expect(grow(cells.retreat(0))).toBe(-1);
    expect(cells.get(1)).toBe(0);
    expect(cells.get(-1)).toBe(0);
    expect(cells.size).toBe(3);
  });

  it('reuses existing positions instead of allocating', () => {
    const cells = new Cells();
    grow(cells.advance(0));
    grow(cells.advance(1));
    expect(grow(cells.retreat(2))).toBe(1);
    expect(grow(cells.advance(0))).toBe(1);
    expect(cells.size).toBe(3);
  });

  it('keeps values while the buffer is reallocated on both sides', () => {
    const cells = new Cells();
    let pos = 0;
    for (let i = 1; i <= 40; i++) {
      pos = grow(cells.advance(pos));
      cells.set(pos, i);
    }
    pos = 0;
    for (let i = 1; i <= 40; i++) {
      pos = grow(cells.retreat(pos));
      cells.set(pos, 100 + i);
    }

    const snap = cells.snapshot();
    expect(snap.length).toBe(81);
    expect(cells.low).toBe(-40);
    expect(cells.high).toBe(40);
    expect(snap[0]).toBe(140);
    expect(snap[39]).toBe(101);
    expect(snap[40]).toBe(0);
    expect(snap[41]).toBe(1);
    expect(snap[80]).toBe(40);
  });

  it('stores values modulo 256', () => {
    const cells = new Cells();
    cells.set(0, 263);
    expect(cells.get(0)).toBe(7);
    cells.set(0, -1);
    expect(cells.get(0)).toBe(255);
  });

  it('rejects access to positions that were never allocated', () => {
    const cells = new Cells();
    expect(() => cells.get(1)).toThrow(RangeError);
    expect(() => cells.set(-1, 0)).toThrow(RangeError);
  });

  it('returns an allocation error once the limit is reached', () => {
    const cells = new Cells({ limit: 3 });
    grow(cells.advance(0));
    grow(cells.retreat(0));

    const right = cells.advance(1);
    expect(right.ok).toBe(false);
    if (!right.ok) {
      expect(right.error).toBeInstanceOf(AllocationError);
      expect(right.error.message).toBe('Memory allocation failed: cell limit of 3 reached');
    }
    expect(cells.retreat(-1).ok).toBe(false);
    expect(cells.size).toBe(3);
  });

  it('grow throws the allocation error', () => {
    const cells = new Cells({ limit: 1 });
    expect(() => grow(cells.advance(0))).toThrow(AllocationError);
  });

  it('release drops every cell but the origin', () => {
    const cells = new Cells();
    const pos = grow(cells.retreat(0));
    cells.set(pos, 9);
    cells.set(0, 4);
    cells.release();
    expect(cells.size).toBe(1);
    expect(cells.get(0)).toBe(0);
    expect(() => cells.get(-1)).toThrow(RangeError);
  });
});
