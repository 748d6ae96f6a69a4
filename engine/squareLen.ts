// engine/squareLen.ts

/**
 * Returns the side length if `length` is a perfect square, else null.
 *
 * `squareLen(0)` is 0: an empty table is a trivial 0×0 square here, even
 * though rotation rejects it.
 *
 * The floating-point root is only an estimate; it is corrected with integer
 * steps so the answer stays exact for every safe integer.
 */
export function squareLen(length: number): number | null {
  if (!Number.isSafeInteger(length) || length < 0) return null;
  if (length === 0) return 0;

  let n = Math.floor(Math.sqrt(length));
  while (n * n > length) n -= 1;
  while ((n + 1) * (n + 1) <= length) n += 1;

  return n * n === length ? n : null;
}
