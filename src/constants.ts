/**
 * @dynbytes/core — layout constants
 *
 * Every byte string lives in one contiguous block. The first METADATA_SIZE
 * bytes are the header; the data region follows and always holds
 * capacity + 1 bytes so the terminator has a home even when size == capacity.
 *
 *   ── Header (DataView reads, little-endian) ─────────────────────────────
 *   [0..3]    capacity   u32  content bytes the block can hold (no terminator)
 *   [4..7]    size       u32  current content length
 *   [8]       flags      u8   FLAG_ATTACHED when the block belongs to the caller
 *   [9..11]   reserved   zero
 *
 *   ── Data ───────────────────────────────────────────────────────────────
 *   [12 .. 12 + capacity]      content, then the 0 terminator at [12 + size]
 *
 * Attached blocks carry the same header inside the caller's buffer, so the
 * caller can corrupt it between calls. The validator re-reads it on entry.
 */

// ─── Header Layout ────────────────────────────────────────────────────────────

export const OFFSET_CAPACITY = 0; // u32
export const OFFSET_SIZE     = 4; // u32
export const OFFSET_FLAGS    = 8; // u8

/** Header bytes in front of the data region. */
export const METADATA_SIZE = 12;

/** Byte offset of data[0] within a block. */
export const DATA_START = METADATA_SIZE;

// ─── Flags ────────────────────────────────────────────────────────────────────

/** Set when the block was supplied by the caller: never grown, never freed. */
export const FLAG_ATTACHED = 0b1;

// ─── Limits & Sentinels ───────────────────────────────────────────────────────

/** Value stored at data[size] after every successful operation. */
export const TERMINATOR = 0;

/** Bytes a block needs beyond its capacity: header plus terminator. */
export const BLOCK_OVERHEAD = METADATA_SIZE + 1;

/**
 * Largest capacity whose block length still fits a u32.
 * 0xFFFFFFFF − METADATA_SIZE − 1 terminator byte.
 */
export const MAX_CAPACITY = 0xffffffff - BLOCK_OVERHEAD;

/** Returned as the position by every search that finds nothing or fails. */
export const NOT_FOUND = -1;

/** Distinct byte values; the size of every shift table and byte set. */
export const ALPHABET_SIZE = 256;

// ─── Geometry Helpers ─────────────────────────────────────────────────────────

/** Block length needed to hold `capacity` content bytes. */
export function blockLength(capacity: number): number {
  return capacity + BLOCK_OVERHEAD;
}

/** Capacity a block of `byteLength` bytes provides. Negative when too short. */
export function capacityFor(byteLength: number): number {
  return byteLength - BLOCK_OVERHEAD;
}
