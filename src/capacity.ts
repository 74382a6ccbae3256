/**
 * @dynbytes/core — capacity / reallocation engine
 *
 * reserve() is the single place a block may be replaced. It grows to EXACTLY
 * the requested capacity: every capacity change is one the caller asked for,
 * so `capacity` after a growing insert or replace equals the new size.
 *
 * Failure leaves `state.block` pointing at the original, unmodified block.
 * Success swaps in the new block; views taken from the old one are stale.
 */

import { MAX_CAPACITY, blockLength } from './constants';
import { ErrorCode } from './errors';
import { readHeader, writeCapacity } from './header';
import type { Allocator } from './allocator';

/** Mutable cell shared by a ByteString handle and the engines it drives. */
export interface BlockState {
  block:              Uint8Array;
  readonly allocator: Allocator | null;
}

/**
 * Ensure the block can hold `capacity` content bytes.
 *
 * Order of refusal:
 *   1. already large enough        → NONE, nothing happens
 *   2. attached handle             → ATTACHED (the caller owns that memory)
 *   3. beyond MAX_CAPACITY         → `limitError` (BIG_COUNT / BIG_REPLACE)
 *   4. no reallocate hook          → REALLOC_FUNC
 *   5. hook returned null / short  → ALLOCATION
 *   6. `admit` refused the block   → its code; the new block is released
 *
 * Ownership comes from the handle, never from the header flag: the caller
 * can write the header, and the validator has already checked that the two
 * agree.
 */
export function reserve(
  state:      BlockState,
  capacity:   number,
  limitError: ErrorCode,
  admit?:     (next: Uint8Array) => ErrorCode,
): ErrorCode {
  const header = readHeader(state.block);
  if (capacity <= header.capacity) return ErrorCode.NONE;

  const allocator = state.allocator;
  if (allocator === null) return ErrorCode.ATTACHED;
  if (capacity > MAX_CAPACITY) return limitError;
  if (allocator.reallocate === undefined) return ErrorCode.REALLOC_FUNC;

  const length = blockLength(capacity);
  const next   = allocator.reallocate(state.block, length);
  if (next === null || next.byteLength < length) return ErrorCode.ALLOCATION;

  const refused = admit === undefined ? ErrorCode.NONE : admit(next);
  if (refused !== ErrorCode.NONE) {
    // A block carved from the same memory as the current one is not ours to free.
    if (next.buffer !== state.block.buffer && allocator.free !== undefined) {
      allocator.free(next);
    }
    return refused;
  }

  writeCapacity(next, capacity);
  state.block = next;
  return ErrorCode.NONE;
}
