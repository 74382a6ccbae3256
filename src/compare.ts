/**
 * @dynbytes/core — comparison and counting
 *
 * Unchecked; see ByteString.compare() / ByteString.count() for validation.
 */

import { NOT_FOUND } from './constants';
import { findForward, findReverse } from './search';
import type { CompareResult } from './types';

/**
 * Byte-wise equality of data[left ..] against `items`.
 *
 * partial: exactly items.length bytes are compared.
 * full:    additionally, the content must end where `items` ends.
 */
export function compareBytes(
  data:    Uint8Array,
  size:    number,
  left:    number,
  items:   Uint8Array,
  partial: boolean,
): CompareResult {
  if (!partial && size - left !== items.length) return 'non-equal';
  for (let i = 0; i < items.length; i++) {
    if (data[left + i] !== items[i]) return 'non-equal';
  }
  return 'equal';
}

/**
 * Occurrences of `pattern` in [left, right].
 *
 * After each hit the cursor moves past one byte (overlapped) or past the
 * whole hit. Scanning from the right mirrors this: the next search window
 * ends one byte before the previous hit's end, or just before its start.
 */
export function countOccurrences(
  data:       Uint8Array,
  left:       number,
  right:      number,
  pattern:    Uint8Array,
  overlapped: boolean,
  fromLeft:   boolean,
): number {
  const m    = pattern.length;
  const step = overlapped ? 1 : m;
  let count  = 0;

  if (fromLeft) {
    let pos = left;
    while (right - pos + 1 >= m) {
      const hit = findForward(data, pos, right, pattern);
      if (hit === NOT_FOUND) break;
      count++;
      pos = hit + step;
    }
    return count;
  }

  let edge = right;
  while (edge - left + 1 >= m) {
    const hit = findReverse(data, left, edge, pattern);
    if (hit === NOT_FOUND) break;
    count++;
    edge = hit + m - 1 - step;
  }
  return count;
}
