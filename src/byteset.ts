/**
 * @dynbytes/core — byte-class sets
 *
 * A 256-bit Uint32Array bitset answering "is byte b one of these?" in O(1).
 * Used by firstOf / firstNotOf / lastOf / lastNotOf and the trim family,
 * which treat their input as an unordered set of candidate bytes rather than
 * a substring. Duplicates in the input are harmless.
 *
 * Bit layout:
 *   word  = b >>> 5        (Math.floor(b / 32))
 *   shift = b  &  31       (b % 32)
 *   set:   bs[word] |= (1 << shift)
 *   test:  bs[word] &  (1 << shift)
 */

import { ALPHABET_SIZE } from './constants';

export type ByteSet = Uint32Array;

/** Build the membership set of every byte value that occurs in `items`. */
export function createByteSet(items: Uint8Array): ByteSet {
  const bs = new Uint32Array(ALPHABET_SIZE / 32);
  for (const b of items) {
    bs[b >>> 5] = (bs[b >>> 5] ?? 0) | (1 << (b & 31));
  }
  return bs;
}

export function hasByte(bs: ByteSet, b: number): boolean {
  return ((bs[b >>> 5] ?? 0) & (1 << (b & 31))) !== 0;
}
