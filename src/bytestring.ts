/**
 * @dynbytes/core — ByteString
 *
 * The public handle. A ByteString owns exactly one block (see constants.ts
 * for its layout) and is either:
 *
 *   owned     created by ByteString.create() through an Allocator; grows on
 *             demand and is released through the allocator's free hook.
 *   attached  created by ByteString.attach() over a caller buffer; never
 *             grows, never freed. The caller owns the buffer's lifetime.
 *
 * Every operation:
 *   1. Re-validates the block (handle → ownership flag → capacity → size →
 *      terminator).
 *   2. Validates its own arguments (window, inputs, aliasing).
 *   3. Only then touches memory, so a rejected call has no side effects.
 *
 * Nothing here throws on bad input. Mutations return an ErrorCode; searches
 * return { index, error } with index = NOT_FOUND on failure. The one
 * documented exception to all-or-nothing is replace() in 'straight' mode.
 *
 * Typical use:
 *
 *   const made = ByteString.create(16);
 *   if (!made.ok) throw new ByteStringError(made.error, 'create');
 *   const str = made.string;
 *
 *   str.insert(0, latin1Bytes('hello, world'));
 *   const { index } = str.find(0, str.size - 1, latin1Bytes('world')); // 7
 *   str.replace(0, str.size - 1, latin1Bytes('o'), latin1Bytes('0'));
 *   str.latin1();                                                       // 'hell0, w0rld'
 *
 * Growth may replace the block. Views returned by `data` or `block` before a
 * growing insert() or replace() must not be used afterwards.
 */

import { heapAllocator, type Allocator } from './allocator';
import { reserve, type BlockState } from './capacity';
import { compareBytes, countOccurrences } from './compare';
import {
  DATA_START,
  MAX_CAPACITY,
  METADATA_SIZE,
  NOT_FOUND,
  TERMINATOR,
  blockLength,
  capacityFor,
} from './constants';
import { latin1String } from './encoding';
import { ErrorCode } from './errors';
import { initHeader, readHeader } from './header';
import {
  commitSize,
  dataOf,
  insertBytes,
  removePattern,
  removeRange,
  reverseRange,
  trimLeftWindow,
  trimRightWindow,
  trimWindow,
} from './mutate';
import { replaceOccurrences } from './replace';
import { createByteSet, type ByteSet } from './byteset';
import {
  classForward,
  classReverse,
  findForward,
  findReverse,
  scanForward,
  scanReverse,
} from './search';
import type {
  AttachMode,
  CompareOutcome,
  CountOptions,
  CountResult,
  ReplaceOptions,
  SearchResult,
} from './types';
import {
  checkInsertPoint,
  checkItems,
  checkOverlap,
  checkStart,
  checkState,
  checkWindow,
  isPosition,
} from './validate';

// ─── Public result types ──────────────────────────────────────────────────────

export type OpenResult =
  | { readonly ok: true;  readonly string: ByteString; readonly error: typeof ErrorCode.NONE }
  | { readonly ok: false; readonly error: ErrorCode };

// ─── Internal helpers ─────────────────────────────────────────────────────────

type Entry =
  | {
      readonly ok:    true;
      readonly state: BlockState;
      readonly block: Uint8Array;
      readonly size:  number;
    }
  | { readonly ok: false; readonly error: ErrorCode };

const EMPTY = new Uint8Array(0);

function failed(error: ErrorCode): { readonly ok: false; readonly error: ErrorCode } {
  return { ok: false, error };
}

function miss(error: ErrorCode): SearchResult {
  return { index: NOT_FOUND, error };
}

/** Reached only by untyped callers; the union is exhaustive. */
function unknownAttachMode(_mode: never): ErrorCode {
  return ErrorCode.DATA;
}

function isByte(n: number): boolean {
  return Number.isInteger(n) && n >= 0 && n <= 0xff;
}

type PatternScan = (data: Uint8Array, left: number, right: number, pattern: Uint8Array) => number;
type ClassScan   = (data: Uint8Array, left: number, right: number, set: ByteSet, member: boolean) => number;

// ─── ByteString ───────────────────────────────────────────────────────────────

export class ByteString {
  private _state: BlockState | null;

  private constructor(state: BlockState) {
    this._state = state;
  }

  // ── Lifecycle ──────────────────────────────────────────────────────────────

  /** Header bytes in front of the data region of every block. */
  static sizeMetadata(): number {
    return METADATA_SIZE;
  }

  /**
   * Allocate an empty, owned string able to hold `capacity` bytes before it
   * needs to grow.
   *
   * CAPACITY    capacity is not an integer in [0, MAX_CAPACITY]
   * ALLOC_FUNC  allocator has no allocate hook
   * ALLOCATION  allocate returned null or a block that is too short
   */
  static create(capacity: number, allocator: Allocator = heapAllocator): OpenResult {
    if (!isPosition(capacity) || capacity > MAX_CAPACITY) return failed(ErrorCode.CAPACITY);
    if (allocator.allocate === undefined) return failed(ErrorCode.ALLOC_FUNC);

    const length = blockLength(capacity);
    const block  = allocator.allocate(length);
    if (block === null || block.byteLength < length) return failed(ErrorCode.ALLOCATION);

    initHeader(block, capacity, 0, /* attached */ false);
    commitSize(block, 0);
    return { ok: true, string: new ByteString({ block, allocator }), error: ErrorCode.NONE };
  }

  /**
   * Lay a string over a caller buffer. The first METADATA_SIZE bytes become
   * the header; capacity is buffer.byteLength − METADATA_SIZE − 1.
   *
   * `size` is ignored in 'zero-size' mode. In the other modes the first
   * `size` data bytes are taken as content as they stand.
   *
   * DATA        buffer is null
   * CAPACITY    buffer shorter than METADATA_SIZE + 1
   * BIG_SIZE    size > capacity
   * TERMINATOR  'size-terminator' and data[size] is not 0
   */
  static attach(
    buffer: Uint8Array | null,
    mode:   AttachMode = 'zero-size',
    size:   number     = 0,
  ): OpenResult {
    if (buffer === null) return failed(ErrorCode.DATA);

    const capacity = capacityFor(buffer.byteLength);
    if (capacity < 0 || capacity > MAX_CAPACITY) return failed(ErrorCode.CAPACITY);

    let contentSize = 0;
    switch (mode) {
      case 'zero-size':
        break;
      case 'size-terminator':
        if (!isPosition(size) || size > capacity) return failed(ErrorCode.BIG_SIZE);
        if (buffer[DATA_START + size] !== TERMINATOR) return failed(ErrorCode.TERMINATOR);
        contentSize = size;
        break;
      case 'size-no-terminator':
        if (!isPosition(size) || size > capacity) return failed(ErrorCode.BIG_SIZE);
        contentSize = size;
        break;
      default:
        return failed(unknownAttachMode(mode));
    }

    initHeader(buffer, capacity, contentSize, /* attached */ true);
    commitSize(buffer, contentSize);
    return {
      ok:     true,
      string: new ByteString({ block: buffer, allocator: null }),
      error:  ErrorCode.NONE,
    };
  }

  /**
   * Release the handle. Owned blocks go back through the allocator's free
   * hook; attached buffers are left exactly as they are.
   *
   * DATA       already destroyed
   * FREE_FUNC  owned, and the allocator has no free hook (handle stays live)
   */
  destroy(): ErrorCode {
    const state = this._state;
    if (state === null) return ErrorCode.DATA;

    const allocator = state.allocator;
    if (allocator !== null) {
      if (allocator.free === undefined) return ErrorCode.FREE_FUNC;
      allocator.free(state.block);
    }

    this._state = null;
    return ErrorCode.NONE;
  }

  // ── Status ─────────────────────────────────────────────────────────────────

  get destroyed(): boolean {
    return this._state === null;
  }

  /** True for strings created by create(). False once destroyed. */
  get owned(): boolean {
    return this._state !== null && this._state.allocator !== null;
  }

  /** True for strings created by attach(). False once destroyed. */
  get attached(): boolean {
    return this._state !== null && this._state.allocator === null;
  }

  /** Content length in bytes; 0 once destroyed. */
  get size(): number {
    return this._state === null ? 0 : readHeader(this._state.block).size;
  }

  /** Content bytes the block holds without growing; 0 once destroyed. */
  get capacity(): number {
    return this._state === null ? 0 : readHeader(this._state.block).capacity;
  }

  /**
   * Live view of the content, [0, size). Writes through it change the
   * string. Stale after any growing insert() or replace().
   */
  get data(): Uint8Array {
    const state = this._state;
    if (state === null) return EMPTY;
    const size = readHeader(state.block).size;
    return state.block.subarray(DATA_START, DATA_START + size);
  }

  /** The whole block, header included; null once destroyed. */
  get block(): Uint8Array | null {
    return this._state === null ? null : this._state.block;
  }

  /** Content decoded one byte per UTF-16 code unit. */
  latin1(): string {
    return latin1String(this.data);
  }

  // ── Insert ─────────────────────────────────────────────────────────────────

  /**
   * Insert `items` before content offset `left`; left == size appends.
   * Grows owned strings as needed.
   *
   * BIG_LEFT      left > size
   * ITEMS         items is null
   * ZERO_COUNT    items is empty
   * BIG_COUNT     size + items.length > MAX_CAPACITY (owned strings)
   * OVERLAP       items shares bytes with [data, data + size + items.length]
   * ATTACHED      result exceeds capacity and the string is attached
   * REALLOC_FUNC  result exceeds capacity and the allocator cannot grow
   * ALLOCATION    reallocation failed; the string is unchanged
   */
  insert(left: number, items: Uint8Array | null): ErrorCode {
    const entry = this.enter();
    if (!entry.ok) return entry.error;
    const { state, block, size } = entry;

    const bounds = checkInsertPoint(size, left);
    if (bounds !== ErrorCode.NONE) return bounds;

    const input = checkItems(items);
    if (!input.ok) return input.error;

    const aliased = checkOverlap(block, size + input.items.length, input.items);
    if (aliased !== ErrorCode.NONE) return aliased;

    return insertBytes(state, size, left, input.items);
  }

  /**
   * Grow an owned string's capacity to at least `capacity` without changing
   * its content. Same codes as the growth half of insert().
   */
  reserve(capacity: number): ErrorCode {
    const entry = this.enter();
    if (!entry.ok) return entry.error;
    if (!isPosition(capacity)) return ErrorCode.CAPACITY;
    return reserve(entry.state, capacity, ErrorCode.CAPACITY);
  }

  // ── Find ───────────────────────────────────────────────────────────────────

  /** First `byte` in [left, right]. ITEMS when `byte` is not 0..255. */
  findSingle(left: number, right: number, byte: number): SearchResult {
    return this.searchByte(left, right, byte, scanForward);
  }

  /** Last `byte` in [left, right]. */
  rfindSingle(left: number, right: number, byte: number): SearchResult {
    return this.searchByte(left, right, byte, scanReverse);
  }

  /**
   * First occurrence of `items` in [left, right] (Horspool).
   * BIG_COUNT when items is longer than the window.
   */
  find(left: number, right: number, items: Uint8Array | null): SearchResult {
    return this.searchPattern(left, right, items, findForward);
  }

  /** Last occurrence of `items` in [left, right] (reverse Horspool). */
  rfind(left: number, right: number, items: Uint8Array | null): SearchResult {
    return this.searchPattern(left, right, items, findReverse);
  }

  /** First byte in [left, right] that is any of `items`. */
  firstOf(left: number, right: number, items: Uint8Array | null): SearchResult {
    return this.searchClass(left, right, items, classForward, true);
  }

  /** First byte in [left, right] that is none of `items`. */
  firstNotOf(left: number, right: number, items: Uint8Array | null): SearchResult {
    return this.searchClass(left, right, items, classForward, false);
  }

  /** Last byte in [left, right] that is any of `items`. */
  lastOf(left: number, right: number, items: Uint8Array | null): SearchResult {
    return this.searchClass(left, right, items, classReverse, true);
  }

  /** Last byte in [left, right] that is none of `items`. */
  lastNotOf(left: number, right: number, items: Uint8Array | null): SearchResult {
    return this.searchClass(left, right, items, classReverse, false);
  }

  // ── Remove / trim ──────────────────────────────────────────────────────────

  /**
   * Remove `count` bytes starting at `left`.
   *
   * ZERO_SIZE   string is empty
   * BIG_LEFT    left >= size
   * ZERO_COUNT  count is 0
   * BIG_COUNT   count > size − left
   */
  removeFrom(left: number, count: number): ErrorCode {
    const entry = this.enter();
    if (!entry.ok) return entry.error;
    const { block, size } = entry;

    if (size === 0) return ErrorCode.ZERO_SIZE;

    const bounds = checkStart(size, left);
    if (bounds !== ErrorCode.NONE) return bounds;

    if (count === 0) return ErrorCode.ZERO_COUNT;
    if (!isPosition(count) || count > size - left) return ErrorCode.BIG_COUNT;

    removeRange(block, size, left, count);
    return ErrorCode.NONE;
  }

  /**
   * Remove every non-overlapping occurrence of `items` inside [left, right],
   * located from the left (default) or from the right.
   */
  remove(left: number, right: number, items: Uint8Array | null, fromLeft = true): ErrorCode {
    const entry = this.enter();
    if (!entry.ok) return entry.error;
    const { block, size } = entry;

    if (size === 0) return ErrorCode.ZERO_SIZE;

    const bounds = checkWindow(size, left, right);
    if (bounds !== ErrorCode.NONE) return bounds;

    const input = checkItems(items);
    if (!input.ok) return input.error;
    if (input.items.length > right - left + 1) return ErrorCode.BIG_COUNT;

    const aliased = checkOverlap(block, size, input.items);
    if (aliased !== ErrorCode.NONE) return aliased;

    removePattern(block, size, left, right, input.items, fromLeft);
    return ErrorCode.NONE;
  }

  /** Strip leading bytes of [left, right] that are any of `items`. */
  trimLeft(left: number, right: number, items: Uint8Array | null): ErrorCode {
    return this.trimWith(left, right, items, trimLeftWindow);
  }

  /** Strip trailing bytes of [left, right] that are any of `items`. */
  trimRight(left: number, right: number, items: Uint8Array | null): ErrorCode {
    return this.trimWith(left, right, items, trimRightWindow);
  }

  /** trimRight() then trimLeft() over what remains of the window. */
  trim(left: number, right: number, items: Uint8Array | null): ErrorCode {
    return this.trimWith(left, right, items, trimWindow);
  }

  // ── Compare / count ────────────────────────────────────────────────────────

  /**
   * Byte-wise equality of the content starting at `left` with `items`.
   * `partial` compares exactly items.length bytes; otherwise the content must
   * also end where `items` ends.
   *
   * BIG_LEFT   left >= size
   * BIG_COUNT  items.length > size − left
   */
  compare(left: number, items: Uint8Array | null, partial: boolean): CompareOutcome {
    const entry = this.enter();
    if (!entry.ok) return { result: 'error', error: entry.error };
    const { block, size } = entry;

    const bounds = checkStart(size, left);
    if (bounds !== ErrorCode.NONE) return { result: 'error', error: bounds };

    const input = checkItems(items);
    if (!input.ok) return { result: 'error', error: input.error };
    if (input.items.length > size - left) return { result: 'error', error: ErrorCode.BIG_COUNT };

    const aliased = checkOverlap(block, size, input.items);
    if (aliased !== ErrorCode.NONE) return { result: 'error', error: aliased };

    return {
      result: compareBytes(dataOf(block), size, left, input.items, partial),
      error:  ErrorCode.NONE,
    };
  }

  /** Occurrences of `items` in [left, right]; count is NOT_FOUND on error. */
  count(
    left:    number,
    right:   number,
    items:   Uint8Array | null,
    options: CountOptions = {},
  ): CountResult {
    const { overlapped = false, fromLeft = true } = options;

    const located = this.validatePattern(left, right, items);
    if (!located.ok) return { count: NOT_FOUND, error: located.error };

    return {
      count: countOccurrences(
        dataOf(located.block), left, right, located.items, overlapped, fromLeft,
      ),
      error: ErrorCode.NONE,
    };
  }

  // ── Replace / reverse ──────────────────────────────────────────────────────

  /**
   * Replace every non-overlapping occurrence of `before` in [left, right]
   * with `after` (null or empty removes them).
   *
   * ZERO_SIZE         string is empty
   * BIG_COUNT         before is longer than the window
   * REPLACEMENT_TYPE  options.mode is not 'dual' or 'straight'
   * OVERLAP           before/after shares bytes with [data, data + size]
   * OVERLAP_REPLACE   before/after shares bytes with the grown content
   * BIG_REPLACE       result would exceed MAX_CAPACITY
   * ATTACHED, REALLOC_FUNC, ALLOCATION — growth failures
   *
   * In 'straight' mode a growth failure can leave some occurrences replaced.
   */
  replace(
    left:    number,
    right:   number,
    before:  Uint8Array | null,
    after:   Uint8Array | null,
    options: ReplaceOptions = {},
  ): ErrorCode {
    const { fromLeft = true, mode = 'dual' } = options;

    const entry = this.enter();
    if (!entry.ok) return entry.error;
    const { state, block, size } = entry;

    if (size === 0) return ErrorCode.ZERO_SIZE;

    const bounds = checkWindow(size, left, right);
    if (bounds !== ErrorCode.NONE) return bounds;

    const input = checkItems(before);
    if (!input.ok) return input.error;
    if (input.items.length > right - left + 1) return ErrorCode.BIG_COUNT;

    if (mode !== 'dual' && mode !== 'straight') return ErrorCode.REPLACEMENT_TYPE;

    const replacement = after ?? EMPTY;
    const aliased =
      checkOverlap(block, size, input.items) !== ErrorCode.NONE ||
      checkOverlap(block, size, replacement) !== ErrorCode.NONE;
    if (aliased) return ErrorCode.OVERLAP;

    return replaceOccurrences(state, size, {
      left,
      right,
      before: input.items,
      after:  replacement,
      fromLeft,
      mode,
    });
  }

  /**
   * Reverse the bytes of [left, right] in place.
   *
   * BIG_RIGHT  right >= size
   * BIG_LEFT   left >= right (a one-byte window is rejected)
   */
  reverse(left: number, right: number): ErrorCode {
    const entry = this.enter();
    if (!entry.ok) return entry.error;

    const bounds = checkWindow(entry.size, left, right);
    if (bounds !== ErrorCode.NONE) return bounds;
    if (left === right) return ErrorCode.BIG_LEFT;

    reverseRange(entry.block, left, right);
    return ErrorCode.NONE;
  }

  // ── Internals ──────────────────────────────────────────────────────────────

  /** Structural validation shared by every operation. */
  private enter(): Entry {
    const state = this._state;
    if (state === null) return failed(ErrorCode.DATA);

    const checked = checkState(state.block, state.allocator === null);
    if (!checked.ok) return checked;

    return {
      ok:    true,
      state,
      block: checked.block,
      size:  checked.header.size,
    };
  }

  /** State → window → items → fits window → no overlap. */
  private validatePattern(
    left:  number,
    right: number,
    items: Uint8Array | null,
  ):
    | { readonly ok: true; readonly block: Uint8Array; readonly items: Uint8Array }
    | { readonly ok: false; readonly error: ErrorCode } {
    const entry = this.enter();
    if (!entry.ok) return entry;
    const { block, size } = entry;

    const bounds = checkWindow(size, left, right);
    if (bounds !== ErrorCode.NONE) return failed(bounds);

    const input = checkItems(items);
    if (!input.ok) return input;
    if (input.items.length > right - left + 1) return failed(ErrorCode.BIG_COUNT);

    const aliased = checkOverlap(block, size, input.items);
    if (aliased !== ErrorCode.NONE) return failed(aliased);

    return { ok: true, block, items: input.items };
  }

  private searchByte(
    left:  number,
    right: number,
    byte:  number,
    scan:  (data: Uint8Array, left: number, right: number, byte: number) => number,
  ): SearchResult {
    const entry = this.enter();
    if (!entry.ok) return miss(entry.error);

    const bounds = checkWindow(entry.size, left, right);
    if (bounds !== ErrorCode.NONE) return miss(bounds);
    if (!isByte(byte)) return miss(ErrorCode.ITEMS);

    return { index: scan(dataOf(entry.block), left, right, byte), error: ErrorCode.NONE };
  }

  private searchPattern(
    left:  number,
    right: number,
    items: Uint8Array | null,
    scan:  PatternScan,
  ): SearchResult {
    const located = this.validatePattern(left, right, items);
    if (!located.ok) return miss(located.error);
    return { index: scan(dataOf(located.block), left, right, located.items), error: ErrorCode.NONE };
  }

  /** Set semantics: no BIG_COUNT, the set may be larger than the window. */
  private searchClass(
    left:   number,
    right:  number,
    items:  Uint8Array | null,
    scan:   ClassScan,
    member: boolean,
  ): SearchResult {
    const entry = this.enter();
    if (!entry.ok) return miss(entry.error);
    const { block, size } = entry;

    const bounds = checkWindow(size, left, right);
    if (bounds !== ErrorCode.NONE) return miss(bounds);

    const input = checkItems(items);
    if (!input.ok) return miss(input.error);

    const aliased = checkOverlap(block, size, input.items);
    if (aliased !== ErrorCode.NONE) return miss(aliased);

    const set = createByteSet(input.items);
    return { index: scan(dataOf(block), left, right, set, member), error: ErrorCode.NONE };
  }

  private trimWith(
    left:  number,
    right: number,
    items: Uint8Array | null,
    trim:  (block: Uint8Array, size: number, left: number, right: number, set: ByteSet) => number,
  ): ErrorCode {
    const entry = this.enter();
    if (!entry.ok) return entry.error;
    const { block, size } = entry;

    if (size === 0) return ErrorCode.ZERO_SIZE;

    const bounds = checkWindow(size, left, right);
    if (bounds !== ErrorCode.NONE) return bounds;

    const input = checkItems(items);
    if (!input.ok) return input.error;

    const aliased = checkOverlap(block, size, input.items);
    if (aliased !== ErrorCode.NONE) return aliased;

    trim(block, size, left, right, createByteSet(input.items));
    return ErrorCode.NONE;
  }
}
