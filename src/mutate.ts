/**
 * @dynbytes/core — mutation engine
 *
 * Unchecked insert / remove / trim / reverse over a validated block. Every
 * function that changes the length finishes with commitSize(), which writes
 * the header size and the terminator together; nothing else writes either.
 *
 * Positions are content offsets (0 = first data byte), not block offsets.
 */

import { DATA_START, NOT_FOUND, TERMINATOR } from './constants';
import { ErrorCode } from './errors';
import { writeSize } from './header';
import { reserve, type BlockState } from './capacity';
import { classForward, classReverse, findForward, findReverse } from './search';
import type { ByteSet } from './byteset';

/** Data region of a block, from data[0] to the end of the block. */
export function dataOf(block: Uint8Array): Uint8Array {
  return block.subarray(DATA_START);
}

/** Publish a new size: header field and terminator. Returns `size`. */
export function commitSize(block: Uint8Array, size: number): number {
  block[DATA_START + size] = TERMINATOR;
  writeSize(block, size);
  return size;
}

// ─── Insert ───────────────────────────────────────────────────────────────────

/**
 * Open a gap of `items.length` bytes at `left` and copy `items` into it.
 * Grows the block first when the result would not fit.
 */
export function insertBytes(
  state: BlockState,
  size:  number,
  left:  number,
  items: Uint8Array,
): ErrorCode {
  const n     = items.length;
  const grown = reserve(state, size + n, ErrorCode.BIG_COUNT);
  if (grown !== ErrorCode.NONE) return grown;

  const block = state.block;
  const at    = DATA_START + left;
  block.copyWithin(at + n, at, DATA_START + size);
  block.set(items, at);
  commitSize(block, size + n);
  return ErrorCode.NONE;
}

// ─── Remove ───────────────────────────────────────────────────────────────────

/** Close the gap [left, left + count). Returns the new size. */
export function removeRange(
  block: Uint8Array,
  size:  number,
  left:  number,
  count: number,
): number {
  const at = DATA_START + left;
  block.copyWithin(at, at + count, DATA_START + size);
  return commitSize(block, size - count);
}

/**
 * Remove every non-overlapping occurrence of `pattern` inside [left, right].
 * The window's right edge shrinks with each removal, so bytes that slide in
 * from beyond `right` are never searched. Returns the new size.
 */
export function removePattern(
  block:    Uint8Array,
  size:     number,
  left:     number,
  right:    number,
  pattern:  Uint8Array,
  fromLeft: boolean,
): number {
  const m    = pattern.length;
  const data = dataOf(block);

  if (fromLeft) {
    let pos = left;
    while (right - pos + 1 >= m) {
      const hit = findForward(data, pos, right, pattern);
      if (hit === NOT_FOUND) break;
      size   = removeRange(block, size, hit, m);
      right -= m;
      pos    = hit;
    }
    return size;
  }

  let edge = right;
  while (edge - left + 1 >= m) {
    const hit = findReverse(data, left, edge, pattern);
    if (hit === NOT_FOUND) break;
    size = removeRange(block, size, hit, m);
    edge = hit - 1;
  }
  return size;
}

// ─── Trim ─────────────────────────────────────────────────────────────────────

/** Strip set members from the left edge of [left, right]. Returns the new size. */
export function trimLeftWindow(
  block: Uint8Array,
  size:  number,
  left:  number,
  right: number,
  set:   ByteSet,
): number {
  const keep = classForward(dataOf(block), left, right, set, false);
  const end  = keep === NOT_FOUND ? right + 1 : keep;
  return end > left ? removeRange(block, size, left, end - left) : size;
}

/** Strip set members from the right edge of [left, right]. Returns the new size. */
export function trimRightWindow(
  block: Uint8Array,
  size:  number,
  left:  number,
  right: number,
  set:   ByteSet,
): number {
  const keep  = classReverse(dataOf(block), left, right, set, false);
  const start = keep === NOT_FOUND ? left : keep + 1;
  return start <= right ? removeRange(block, size, start, right - start + 1) : size;
}

/** Right edge first, then the left edge of whatever remains of the window. */
export function trimWindow(
  block: Uint8Array,
  size:  number,
  left:  number,
  right: number,
  set:   ByteSet,
): number {
  const trimmed = trimRightWindow(block, size, left, right, set);
  const edge    = right - (size - trimmed);
  if (edge < left) return trimmed;
  return trimLeftWindow(block, trimmed, left, edge, set);
}

// ─── Reverse ──────────────────────────────────────────────────────────────────

export function reverseRange(block: Uint8Array, left: number, right: number): void {
  let i = DATA_START + left;
  let j = DATA_START + right;
  while (i < j) {
    const tmp = block[i] ?? 0;
    block[i]  = block[j] ?? 0;
    block[j]  = tmp;
    i++;
    j--;
  }
}
