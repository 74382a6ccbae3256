/**
 * @dynbytes/core — invariant validator
 *
 * Pre-flight checks run by every public operation before it touches memory.
 * Each check returns ErrorCode.NONE or the code of the violated invariant;
 * operations chain them in the fixed order below and stop at the first
 * failure, so a rejected call never has side effects:
 *
 *   checkState      handle → ownership flag → capacity → size ≤ capacity → terminator
 *   checkWindow     right < size → left ≤ right
 *   checkItems      present → non-empty
 *   checkOverlap    input ∩ active region = ∅
 *
 * Positions must be non-negative safe integers. A malformed `left` reports
 * BIG_LEFT and a malformed `right` reports BIG_RIGHT, the same codes an
 * out-of-range value would.
 */

import {
  BLOCK_OVERHEAD,
  DATA_START,
  MAX_CAPACITY,
  TERMINATOR,
  blockLength,
} from './constants';
import { ErrorCode } from './errors';
import { readHeader, type BlockHeader } from './header';

export type StateCheck =
  | { readonly ok: true;  readonly block: Uint8Array; readonly header: BlockHeader }
  | { readonly ok: false; readonly error: ErrorCode };

export function isPosition(n: number): boolean {
  return Number.isSafeInteger(n) && n >= 0;
}

// ─── Structural invariants ────────────────────────────────────────────────────

/**
 * Validate the block behind a handle. Corruption is reported, never repaired:
 * a caller who scribbled over an attached header gets DATA, CAPACITY,
 * BIG_SIZE or TERMINATOR back until they fix it.
 *
 * `attached` is the handle's own ownership tag. The header flag must agree
 * with it; a block whose flag says otherwise no longer belongs to the handle
 * as created, and is reported as DATA.
 */
export function checkState(block: Uint8Array | null, attached: boolean): StateCheck {
  if (block === null) return { ok: false, error: ErrorCode.DATA };

  if (block.byteLength < BLOCK_OVERHEAD) return { ok: false, error: ErrorCode.CAPACITY };

  const header = readHeader(block);
  if (header.attached !== attached) return { ok: false, error: ErrorCode.DATA };

  if (header.capacity > MAX_CAPACITY || blockLength(header.capacity) > block.byteLength) {
    return { ok: false, error: ErrorCode.CAPACITY };
  }

  if (header.size > header.capacity) return { ok: false, error: ErrorCode.BIG_SIZE };

  if (block[DATA_START + header.size] !== TERMINATOR) {
    return { ok: false, error: ErrorCode.TERMINATOR };
  }

  return { ok: true, block, header };
}

// ─── Positions ────────────────────────────────────────────────────────────────

/** Inclusive window [left, right] inside content of length `size`. */
export function checkWindow(size: number, left: number, right: number): ErrorCode {
  if (!isPosition(right) || right >= size) return ErrorCode.BIG_RIGHT;
  if (!isPosition(left)  || left > right)  return ErrorCode.BIG_LEFT;
  return ErrorCode.NONE;
}

/** Insertion point: 0..size inclusive; `size` appends. */
export function checkInsertPoint(size: number, left: number): ErrorCode {
  if (!isPosition(left) || left > size) return ErrorCode.BIG_LEFT;
  return ErrorCode.NONE;
}

/** Start of a range that must contain at least one existing byte. */
export function checkStart(size: number, left: number): ErrorCode {
  if (!isPosition(left) || left >= size) return ErrorCode.BIG_LEFT;
  return ErrorCode.NONE;
}

// ─── Inputs ───────────────────────────────────────────────────────────────────

export type ItemsCheck =
  | { readonly ok: true;  readonly items: Uint8Array }
  | { readonly ok: false; readonly error: ErrorCode };

/** Required, non-empty input. */
export function checkItems(items: Uint8Array | null | undefined): ItemsCheck {
  if (items === null || items === undefined) return { ok: false, error: ErrorCode.ITEMS };
  if (items.length === 0) return { ok: false, error: ErrorCode.ZERO_COUNT };
  return { ok: true, items };
}

// ─── Aliasing ─────────────────────────────────────────────────────────────────

/**
 * True when `items` shares at least one byte with the data region
 * [data + start, data + end) of `block`.
 *
 * Two views alias only when they sit on the same ArrayBuffer, so the test is
 * a half-open interval intersection over absolute byte offsets within that
 * buffer. Views on different buffers never overlap, whatever their offsets.
 */
export function overlaps(
  block: Uint8Array,
  start: number,
  end:   number,
  items: Uint8Array,
): boolean {
  if (items.byteLength === 0 || end <= start) return false;
  if (items.buffer !== block.buffer) return false;

  const regionStart = block.byteOffset + DATA_START + start;
  const regionEnd   = block.byteOffset + DATA_START + end;
  const itemsStart  = items.byteOffset;
  const itemsEnd    = items.byteOffset + items.byteLength;

  return regionStart < itemsEnd && itemsStart < regionEnd;
}

/**
 * Active region for an operation whose content ends at `size`: the content
 * plus its terminator, [data, data + size].
 */
export function checkOverlap(
  block:  Uint8Array,
  size:   number,
  items:  Uint8Array | null,
  code:   ErrorCode = ErrorCode.OVERLAP,
): ErrorCode {
  if (items === null) return ErrorCode.NONE;
  return overlaps(block, 0, size + 1, items) ? code : ErrorCode.NONE;
}
