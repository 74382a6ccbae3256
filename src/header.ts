/**
 * @dynbytes/core — block header access
 *
 * initHeader()  — called once by create() / attach() on a fresh block.
 * readHeader()  — snapshot of the three header fields; does NOT validate.
 *                 validateState() decides whether the snapshot is usable.
 * writeSize()   — the only header field that changes on every mutation.
 * writeCapacity() — changes only after a successful reallocation.
 *
 * All multi-byte fields are little-endian u32, read through a DataView that
 * spans exactly the block (blocks may be subarrays of a larger buffer).
 */

import {
  OFFSET_CAPACITY,
  OFFSET_SIZE,
  OFFSET_FLAGS,
  METADATA_SIZE,
  FLAG_ATTACHED,
} from './constants';

export interface BlockHeader {
  readonly capacity: number;
  readonly size:     number;
  readonly attached: boolean;
}

function viewOf(block: Uint8Array): DataView {
  return new DataView(block.buffer, block.byteOffset, block.byteLength);
}

/**
 * Write a complete header. Reserved bytes are zeroed so a recycled caller
 * buffer cannot leak stale flags into the new string.
 */
export function initHeader(
  block:    Uint8Array,
  capacity: number,
  size:     number,
  attached: boolean,
): void {
  block.fill(0, 0, METADATA_SIZE);
  const view = viewOf(block);
  view.setUint32(OFFSET_CAPACITY, capacity, /* le */ true);
  view.setUint32(OFFSET_SIZE,     size,              true);
  view.setUint8(OFFSET_FLAGS, attached ? FLAG_ATTACHED : 0);
}

export function readHeader(block: Uint8Array): BlockHeader {
  const view = viewOf(block);
  return {
    capacity: view.getUint32(OFFSET_CAPACITY, true),
    size:     view.getUint32(OFFSET_SIZE,     true),
    attached: (view.getUint8(OFFSET_FLAGS) & FLAG_ATTACHED) !== 0,
  };
}

export function writeSize(block: Uint8Array, size: number): void {
  viewOf(block).setUint32(OFFSET_SIZE, size, true);
}

export function writeCapacity(block: Uint8Array, capacity: number): void {
  viewOf(block).setUint32(OFFSET_CAPACITY, capacity, true);
}
