import { describe, expect, it } from '@jest/globals';
import { ringIndices, ringLength, rotateRight } from '../rotateRight';

function range(count: number): number[] {
  return Array.from({ length: count }, (_, i) => i + 1);
}

describe('rotateRight', () => {
  it('rotates a 2x2 table', () => {
    // [1, 2]    [3, 1]
    // [3, 4] →  [4, 2]
    const data = [1, 2, 3, 4];
    expect(rotateRight(data)).toEqual({ ok: true, side: 2 });
    expect(data).toEqual([3, 1, 4, 2]);
  });

  it('rotates a 3x3 table and keeps the centre', () => {
    const data = range(9);
    rotateRight(data);
    expect(data).toEqual([4, 1, 2, 7, 5, 3, 8, 9, 6]);
  });

  it('rotates negative values', () => {
    const data = [-1, -2, -3, -4];
    rotateRight(data);
    expect(data).toEqual([-3, -1, -4, -2]);
  });

  it('rotates both rings of a 4x4 table', () => {
    const data = range(16);
    rotateRight(data);
    expect(data).toEqual([5, 1, 2, 3, 9, 10, 6, 4, 13, 11, 7, 8, 14, 15, 16, 12]);
  });

  it('leaves a 1x1 table unchanged', () => {
    const data = [-5];
    expect(rotateRight(data)).toEqual({ ok: true, side: 1 });
    expect(data).toEqual([-5]);
  });

  it('fails with EmptyArray on an empty table', () => {
    const data: number[] = [];
    expect(rotateRight(data)).toEqual({ ok: false, code: 'E101' });
    expect(data).toEqual([]);
  });

  it('fails with NotSquare without touching the data', () => {
    for (const length of [2, 3, 5, 8, 10, 15, 99]) {
      const data = range(length);
      expect(rotateRight(data)).toEqual({ ok: false, code: 'E102' });
      expect(data).toEqual(range(length));
    }
  });

  it('moves every ring element one step clockwise', () => {
    for (let side = 2; side <= 7; side++) {
      const data = range(side * side);
      const before = data.slice();
      rotateRight(data);

      for (let layer = 0; layer < Math.floor(side / 2); layer++) {
        const ring = ringIndices(side, layer);
        const was = ring.map((i) => before[i]);
        const now = ring.map((i) => data[i]);
        expect(now).toEqual([was[was.length - 1], ...was.slice(0, -1)]);
      }
    }
  });

  it('restores each ring after as many rotations as it has cells', () => {
    for (let side = 2; side <= 8; side++) {
      for (let layer = 0; layer < Math.floor(side / 2); layer++) {
        const data = range(side * side);
        const ring = ringIndices(side, layer);
        const original = ring.map((i) => data[i]);

        const steps = ringLength(side, layer);
        for (let step = 0; step < steps; step++) {
          rotateRight(data);
        }

        expect(ring.map((i) => data[i])).toEqual(original);
      }
    }
  });

  it('is deterministic across fresh copies', () => {
    const source = [7, -3, 0.5, 12, 9, 9, -1, 4, 2, 8, 6, 5, 3, 1, 0, 11];
    const first = source.slice();
    const second = source.slice();

    rotateRight(first);
    rotateRight(first);
    rotateRight(second);
    rotateRight(second);

    expect(first).toEqual(second);
  });
});

describe('ringLength', () => {
  it('counts cells per ring', () => {
    expect(ringLength(4, 0)).toBe(12);
    expect(ringLength(4, 1)).toBe(4);
    expect(ringLength(5, 1)).toBe(8);
  });

  it('counts a collapsed centre as one cell', () => {
    expect(ringLength(5, 2)).toBe(1);
    expect(ringLength(1, 0)).toBe(1);
  });

  it('returns 0 for layers outside the table', () => {
    expect(ringLength(4, 2)).toBe(0);
    expect(ringLength(0, 0)).toBe(0);
    expect(ringLength(3, -1)).toBe(0);
  });
});

describe('ringIndices', () => {
  it('walks the ring clockwise from its top-left corner', () => {
    expect(ringIndices(3, 0)).toEqual([0, 1, 2, 5, 8, 7, 6, 3]);
    expect(ringIndices(4, 1)).toEqual([5, 6, 10, 9]);
  });

  it('returns the single centre index of an odd table', () => {
    expect(ringIndices(3, 1)).toEqual([4]);
  });

  it('returns no indices outside the table', () => {
    expect(ringIndices(2, 1)).toEqual([]);
  });
});
