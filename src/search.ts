/**
 * @dynbytes/core — pattern search engine
 *
 * Unchecked scans over an inclusive window [left, right] of a data region.
 * Callers validate the window and inputs first (see validate.ts); these
 * functions assume 0 <= left <= right < data.length and a non-empty pattern.
 * Every function returns the 0-based offset of the match, or NOT_FOUND.
 *
 * ── Horspool ─────────────────────────────────────────────────────────────────
 *
 * Forward search aligns the pattern at `pos` and compares right to left. On a
 * mismatch it shifts by the table entry of the haystack byte under the
 * pattern's LAST position:
 *
 *   shift[b] = m                     if b does not occur in pattern[0 .. m-2]
 *   shift[b] = m - 1 - i             i = last occurrence of b in pattern[0 .. m-2]
 *
 * Reverse search is the mirror image: it aligns at `pos`, scanning from the
 * right edge of the window down, and shifts left by the table entry of the
 * haystack byte under the pattern's FIRST position:
 *
 *   shift[b] = m                     if b does not occur in pattern[1 .. m-1]
 *   shift[b] = i                     i = first occurrence of b in pattern[1 .. m-1]
 *
 * Both degenerate to the linear single-byte scan when m == 1.
 */

import { ALPHABET_SIZE, NOT_FOUND } from './constants';
import { hasByte, type ByteSet } from './byteset';

// ─── Single-byte scans ────────────────────────────────────────────────────────

export function scanForward(data: Uint8Array, left: number, right: number, byte: number): number {
  for (let i = left; i <= right; i++) {
    if (data[i] === byte) return i;
  }
  return NOT_FOUND;
}

export function scanReverse(data: Uint8Array, left: number, right: number, byte: number): number {
  for (let i = right; i >= left; i--) {
    if (data[i] === byte) return i;
  }
  return NOT_FOUND;
}

// ─── Shift tables ─────────────────────────────────────────────────────────────

export function forwardShiftTable(pattern: Uint8Array): Uint32Array {
  const m     = pattern.length;
  const table = new Uint32Array(ALPHABET_SIZE).fill(m);
  for (let i = 0; i < m - 1; i++) {
    table[pattern[i] ?? 0] = m - 1 - i;
  }
  return table;
}

export function reverseShiftTable(pattern: Uint8Array): Uint32Array {
  const m     = pattern.length;
  const table = new Uint32Array(ALPHABET_SIZE).fill(m);
  // Walk right to left so the first occurrence wins.
  for (let i = m - 1; i >= 1; i--) {
    table[pattern[i] ?? 0] = i;
  }
  return table;
}

// ─── Horspool ─────────────────────────────────────────────────────────────────

/** True when pattern occurs in data at offset `pos`, comparing last byte first. */
function matchesAt(data: Uint8Array, pos: number, pattern: Uint8Array): boolean {
  for (let j = pattern.length - 1; j >= 0; j--) {
    if (data[pos + j] !== pattern[j]) return false;
  }
  return true;
}

export function horspoolForward(
  data:    Uint8Array,
  left:    number,
  right:   number,
  pattern: Uint8Array,
): number {
  const m = pattern.length;
  if (m === 0 || right - left + 1 < m) return NOT_FOUND;

  const shift = forwardShiftTable(pattern);
  const last  = right - m + 1; // rightmost legal alignment

  let pos = left;
  while (pos <= last) {
    if (matchesAt(data, pos, pattern)) return pos;
    pos += shift[data[pos + m - 1] ?? 0] ?? m;
  }
  return NOT_FOUND;
}

export function horspoolReverse(
  data:    Uint8Array,
  left:    number,
  right:   number,
  pattern: Uint8Array,
): number {
  const m = pattern.length;
  if (m === 0 || right - left + 1 < m) return NOT_FOUND;

  const shift = reverseShiftTable(pattern);

  let pos = right - m + 1;
  while (pos >= left) {
    if (matchesAt(data, pos, pattern)) return pos;
    pos -= shift[data[pos] ?? 0] ?? m;
  }
  return NOT_FOUND;
}

// ─── Dispatch ─────────────────────────────────────────────────────────────────

/** First occurrence of `pattern` in [left, right]; linear scan for one byte. */
export function findForward(
  data:    Uint8Array,
  left:    number,
  right:   number,
  pattern: Uint8Array,
): number {
  if (pattern.length === 1) return scanForward(data, left, right, pattern[0] ?? 0);
  return horspoolForward(data, left, right, pattern);
}

/** Last occurrence of `pattern` in [left, right]; linear scan for one byte. */
export function findReverse(
  data:    Uint8Array,
  left:    number,
  right:   number,
  pattern: Uint8Array,
): number {
  if (pattern.length === 1) return scanReverse(data, left, right, pattern[0] ?? 0);
  return horspoolReverse(data, left, right, pattern);
}

// ─── Character-class scans ────────────────────────────────────────────────────
//
// `member` selects the "Of" (stop at first member) or "NotOf" (stop at first
// non-member) flavour.

export function classForward(
  data:   Uint8Array,
  left:   number,
  right:  number,
  set:    ByteSet,
  member: boolean,
): number {
  for (let i = left; i <= right; i++) {
    if (hasByte(set, data[i] ?? 0) === member) return i;
  }
  return NOT_FOUND;
}

export function classReverse(
  data:   Uint8Array,
  left:   number,
  right:  number,
  set:    ByteSet,
  member: boolean,
): number {
  for (let i = right; i >= left; i--) {
    if (hasByte(set, data[i] ?? 0) === member) return i;
  }
  return NOT_FOUND;
}
