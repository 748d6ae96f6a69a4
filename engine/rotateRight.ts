// engine/rotateRight.ts
// Layer-walk rotation of square tables stored row-major in a flat array.

import { ErrorCodes, type RotationFailureCode } from './errorCodes';
import { squareLen } from './squareLen';

export type RotationResult =
  | { ok: true; side: number }
  | { ok: false; code: RotationFailureCode };

function idx(side: number, row: number, col: number): number {
  return row * side + col;
}

/**
 * Shift every element of an N×N table one position clockwise around its ring.
 *
 * `[1, 2, 3, 4]` is the 2×2 table `[[1, 2], [3, 4]]` and becomes
 * `[3, 1, 4, 2]`. Rings are processed outermost first; an odd table's
 * centre cell never moves.
 *
 * Shape checks run before the first write, so a failed call leaves `data`
 * untouched.
 */
export function rotateRight(data: number[]): RotationResult {
  if (data.length === 0) {
    return { ok: false, code: ErrorCodes.EMPTY_ARRAY };
  }

  const side = squareLen(data.length);
  if (side === null) {
    return { ok: false, code: ErrorCodes.NOT_SQUARE };
  }

  if (side <= 1) {
    return { ok: true, side };
  }

  const layers = Math.floor(side / 2);
  for (let layer = 0; layer < layers; layer++) {
    rotateRingClockwise(data, side, layer);
  }

  return { ok: true, side };
}

// One clockwise step for a single ring: top row, right column, bottom row,
// left column. `carry` holds the value moving into the next cell.
function rotateRingClockwise(data: number[], side: number, layer: number): void {
  const first = layer;
  const last = side - 1 - layer;

  // Lands on (first, first).
  let carry = data[idx(side, first + 1, first)];

  for (let col = first; col <= last; col++) {
    const i = idx(side, first, col);
    const temp = data[i];
    data[i] = carry;
    carry = temp;
  }

  for (let row = first + 1; row <= last; row++) {
    const i = idx(side, row, last);
    const temp = data[i];
    data[i] = carry;
    carry = temp;
  }

  for (let col = last - 1; col >= first; col--) {
    const i = idx(side, last, col);
    const temp = data[i];
    data[i] = carry;
    carry = temp;
  }

  for (let row = last - 1; row > first; row--) {
    const i = idx(side, row, first);
    const temp = data[i];
    data[i] = carry;
    carry = temp;
  }
}

/**
 * Number of cells in ring `layer` of a `side`×`side` table.
 * A collapsed centre counts as 1; a layer outside the table as 0.
 */
export function ringLength(side: number, layer: number): number {
  if (layer < 0 || layer >= Math.ceil(side / 2)) return 0;
  const span = side - 1 - 2 * layer;
  return span > 0 ? 4 * span : 1;
}

/**
 * Flat indices of ring `layer`, clockwise from its top-left corner.
 */
export function ringIndices(side: number, layer: number): number[] {
  const count = ringLength(side, layer);
  if (count === 0) return [];

  const first = layer;
  const last = side - 1 - layer;
  if (count === 1) return [idx(side, first, first)];

  const indices: number[] = [];
  for (let col = first; col <= last; col++) indices.push(idx(side, first, col));
  for (let row = first + 1; row <= last; row++) indices.push(idx(side, row, last));
  for (let col = last - 1; col >= first; col--) indices.push(idx(side, last, col));
  for (let row = last - 1; row > first; row--) indices.push(idx(side, row, first));

  return indices;
}
