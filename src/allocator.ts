/**
 * @dynbytes/core — allocator strategy
 *
 * Owned strings obtain, grow and release their block through an Allocator
 * passed to ByteString.create(). Each hook is optional; an operation that
 * needs a missing hook fails with its dedicated code (ALLOC_FUNC,
 * REALLOC_FUNC, FREE_FUNC) instead of throwing.
 *
 * Hooks report failure by returning null. A hook that throws is a bug in the
 * hook and propagates to the caller.
 */

export interface Allocator {
  /** Return a zero-filled block of exactly `byteLength` bytes, or null. */
  readonly allocate?:   (byteLength: number) => Uint8Array | null;
  /**
   * Return a block of `byteLength` bytes whose prefix equals `block`'s
   * content (up to the shorter length), or null. On null the original block
   * must remain valid and unchanged.
   */
  readonly reallocate?: (block: Uint8Array, byteLength: number) => Uint8Array | null;
  readonly free?:       (block: Uint8Array) => void;
}

/**
 * Allocate through `new Uint8Array`. Lengths the engine cannot back
 * (RangeError from the constructor) come back as null.
 */
function allocateHeap(byteLength: number): Uint8Array | null {
  try {
    return new Uint8Array(byteLength);
  } catch (err) {
    if (err instanceof RangeError) return null;
    throw err;
  }
}

/** Default allocator: plain ArrayBuffer-backed blocks, garbage-collected. */
export const heapAllocator: Allocator = {
  allocate: allocateHeap,

  reallocate(block, byteLength) {
    const next = allocateHeap(byteLength);
    if (next === null) return null;
    next.set(block.subarray(0, Math.min(block.byteLength, byteLength)));
    return next;
  },

  // The GC reclaims the block once the handle drops it; zeroing makes any
  // view the caller kept past destroy() read as empty.
  free(block) {
    block.fill(0);
  },
};
