/**
 * @dynbytes/core — replace engine
 *
 * Substitutes every non-overlapping occurrence of `before` inside the window
 * [left, right] with `after`. Three paths, chosen by the length change:
 *
 *   after ≤ before      in place, one pass. Each hit is overwritten and the
 *                       remainder shifted left; the window's right edge
 *                       shrinks with it. Never grows, never fails.
 *
 *   after > before,     pass 1 collects every hit and sizes the result
 *   mode 'dual'         exactly. Growth (if any) happens once, before a byte
 *                       moves. Pass 2 is a single right-to-left sweep that
 *                       moves each tail segment straight to its final offset,
 *                       so no byte is moved twice and settled output is never
 *                       rescanned. All-or-nothing.
 *
 *   after > before,     hit by hit: grow by (after − before), shift, write.
 *   mode 'straight'     A growth failure returns immediately. Hits already
 *                       replaced STAY replaced; the original content is not
 *                       restored. Callers must not rely on content after a
 *                       failed straight replace.
 *
 * Hits are located left to right when `fromLeft`, right to left otherwise;
 * for patterns that overlap themselves the two directions can pick different
 * occurrences ("aaa" / "aa" → hit at 0 vs. hit at 1).
 */

import { DATA_START, NOT_FOUND } from './constants';
import { ErrorCode } from './errors';
import { reserve, type BlockState } from './capacity';
import { commitSize, dataOf, removeRange } from './mutate';
import { findForward, findReverse } from './search';
import { overlaps } from './validate';
import type { ReplaceMode } from './types';

export interface ReplaceRequest {
  readonly left:     number;
  readonly right:    number;
  readonly before:   Uint8Array;
  readonly after:    Uint8Array;
  readonly fromLeft: boolean;
  readonly mode:     ReplaceMode;
}

export function replaceOccurrences(
  state: BlockState,
  size:  number,
  req:   ReplaceRequest,
): ErrorCode {
  if (req.after.length <= req.before.length) {
    replaceInPlace(state.block, size, req);
    return ErrorCode.NONE;
  }
  return req.mode === 'dual'
    ? replaceDual(state, size, req)
    : replaceStraight(state, size, req);
}

// ─── Hit collection ───────────────────────────────────────────────────────────

/**
 * Non-overlapping occurrences of `pattern` in [left, right], in ascending
 * offset order regardless of scan direction.
 */
export function locateAll(
  data:     Uint8Array,
  left:     number,
  right:    number,
  pattern:  Uint8Array,
  fromLeft: boolean,
): number[] {
  const m    = pattern.length;
  const hits: number[] = [];

  if (fromLeft) {
    let pos = left;
    while (right - pos + 1 >= m) {
      const hit = findForward(data, pos, right, pattern);
      if (hit === NOT_FOUND) break;
      hits.push(hit);
      pos = hit + m;
    }
    return hits;
  }

  let edge = right;
  while (edge - left + 1 >= m) {
    const hit = findReverse(data, left, edge, pattern);
    if (hit === NOT_FOUND) break;
    hits.push(hit);
    edge = hit - 1;
  }
  return hits.reverse();
}

/**
 * OVERLAP_REPLACE when either input shares bytes with the content-to-be
 * [data, data + size] of a block.
 */
function admitFor(size: number, req: ReplaceRequest): (block: Uint8Array) => ErrorCode {
  return (block) =>
    overlaps(block, 0, size + 1, req.before) || overlaps(block, 0, size + 1, req.after)
      ? ErrorCode.OVERLAP_REPLACE
      : ErrorCode.NONE;
}

// ─── Same size or shrinking ───────────────────────────────────────────────────

function replaceInPlace(block: Uint8Array, size: number, req: ReplaceRequest): number {
  const { before, after } = req;
  const m      = before.length;
  const k      = after.length;
  const shrink = m - k;
  const data   = dataOf(block);

  if (req.fromLeft) {
    let pos   = req.left;
    let right = req.right;
    while (right - pos + 1 >= m) {
      const hit = findForward(data, pos, right, before);
      if (hit === NOT_FOUND) break;
      block.set(after, DATA_START + hit);
      if (shrink > 0) size = removeRange(block, size, hit + k, shrink);
      right -= shrink;
      pos    = hit + k;
    }
    return size;
  }

  let edge = req.right;
  while (edge - req.left + 1 >= m) {
    const hit = findReverse(data, req.left, edge, before);
    if (hit === NOT_FOUND) break;
    block.set(after, DATA_START + hit);
    if (shrink > 0) size = removeRange(block, size, hit + k, shrink);
    edge = hit - 1;
  }
  return size;
}

// ─── Growing: dual pass ───────────────────────────────────────────────────────

function replaceDual(state: BlockState, size: number, req: ReplaceRequest): ErrorCode {
  const m = req.before.length;
  const k = req.after.length;

  // ── Pass 1: locate and size ────────────────────────────────────────────────

  const hits = locateAll(dataOf(state.block), req.left, req.right, req.before, req.fromLeft);
  if (hits.length === 0) return ErrorCode.NONE;

  const newSize = size + hits.length * (k - m);

  const admit   = admitFor(newSize, req);
  const aliased = admit(state.block);
  if (aliased !== ErrorCode.NONE) return aliased;

  // A reallocated block is vetted before it replaces the current one, so an
  // OVERLAP_REPLACE here leaves capacity as well as content untouched.
  const grown = reserve(state, newSize, ErrorCode.BIG_REPLACE, admit);
  if (grown !== ErrorCode.NONE) return grown;

  // ── Pass 2: right-to-left sweep ────────────────────────────────────────────
  //
  // `read` is the end of the not-yet-moved prefix of the old content, `write`
  // the end of the not-yet-filled suffix of the new content. Before handling
  // hit i (0-based), write − read = (i + 1) × (k − m) ≥ 0, so every move goes
  // rightwards and the replacement for hit i lands at or after offset hits[i].

  const block = state.block;
  let read  = size;
  let write = newSize;

  for (let i = hits.length - 1; i >= 0; i--) {
    const hit       = hits[i] ?? 0;
    const tailStart = hit + m;
    const tailLen   = read - tailStart;

    write -= tailLen;
    block.copyWithin(DATA_START + write, DATA_START + tailStart, DATA_START + read);
    write -= k;
    block.set(req.after, DATA_START + write);
    read = hit;
  }

  commitSize(block, newSize);
  return ErrorCode.NONE;
}

// ─── Growing: straight ────────────────────────────────────────────────────────

function replaceStraight(state: BlockState, size: number, req: ReplaceRequest): ErrorCode {
  const m    = req.before.length;
  const k    = req.after.length;
  const grow = k - m;

  // Grow, shift and write one hit. Returns the failing code, or NONE.
  const substitute = (hit: number): ErrorCode => {
    const need    = size + grow;
    const admit   = admitFor(need, req);
    const aliased = admit(state.block);
    if (aliased !== ErrorCode.NONE) return aliased;

    const grown = reserve(state, need, ErrorCode.BIG_REPLACE, admit);
    if (grown !== ErrorCode.NONE) return grown;

    const block = state.block;
    block.copyWithin(DATA_START + hit + k, DATA_START + hit + m, DATA_START + size);
    block.set(req.after, DATA_START + hit);
    size = commitSize(block, need);
    return ErrorCode.NONE;
  };

  if (req.fromLeft) {
    let pos   = req.left;
    let right = req.right;
    while (right - pos + 1 >= m) {
      const hit = findForward(dataOf(state.block), pos, right, req.before);
      if (hit === NOT_FOUND) break;
      const err = substitute(hit);
      if (err !== ErrorCode.NONE) return err;
      right += grow;
      pos    = hit + k;
    }
    return ErrorCode.NONE;
  }

  let edge = req.right;
  while (edge - req.left + 1 >= m) {
    const hit = findReverse(dataOf(state.block), req.left, edge, req.before);
    if (hit === NOT_FOUND) break;
    const err = substitute(hit);
    if (err !== ErrorCode.NONE) return err;
    edge = hit - 1;
  }
  return ErrorCode.NONE;
}
