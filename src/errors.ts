/**
 * @dynbytes/core — error codes
 *
 * Operations never throw on the normal path. They return one of these codes;
 * NONE means the operation completed. Searches additionally return NOT_FOUND
 * as their position whenever the code is not NONE.
 *
 * Numeric values are stable and part of the public contract.
 */

export const ErrorCode = {
  NONE:              0,
  /** Reserved for an initialization gate; never produced. */
  LICENSE:           1,
  /**
   * Handle is destroyed, attach() received no buffer, or the header's
   * ownership flag no longer matches the handle.
   */
  DATA:              2,
  /** Reserved; size values are validated as BIG_SIZE. */
  SIZE:              3,
  /** Capacity out of range or inconsistent with the block length. */
  CAPACITY:          4,
  /** Operation needs content but size is 0. */
  ZERO_SIZE:         5,
  /** size > capacity. */
  BIG_SIZE:          6,
  /** Input is empty. */
  ZERO_COUNT:        7,
  /** Input is longer than the window, or the result would exceed MAX_CAPACITY. */
  BIG_COUNT:         8,
  /** `left` past `right`, or past the end of content. */
  BIG_LEFT:          9,
  /** right >= size. */
  BIG_RIGHT:         10,
  /** Required input is null. */
  ITEMS:             11,
  /** data[size] is not 0. */
  TERMINATOR:        12,
  /** Input shares bytes with the string's active region. */
  OVERLAP:           13,
  ALLOC_FUNC:        14,
  REALLOC_FUNC:      15,
  FREE_FUNC:         16,
  /** The allocator returned nothing usable. */
  ALLOCATION:        17,
  /** Growth needed, but the block belongs to the caller. */
  ATTACHED:          18,
  /** Unknown ReplaceMode. */
  REPLACEMENT_TYPE:  19,
  /** Replacement would exceed MAX_CAPACITY. */
  BIG_REPLACE:       20,
  /** Input overlaps the region the replaced content would occupy. */
  OVERLAP_REPLACE:   21,
} as const;

export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

const NAMES: ReadonlyMap<number, string> = new Map(
  Object.entries(ErrorCode).map(([name, code]) => [code, name]),
);

/** Symbolic name of a code, e.g. errorName(9) === 'BIG_LEFT'. */
export function errorName(code: number): string {
  return NAMES.get(code) ?? `UNKNOWN(${code})`;
}

// ─── Errors ───────────────────────────────────────────────────────────────────

/**
 * Thrown by assertOk() for callers who prefer exceptions over codes.
 * The library itself never throws it from an operation.
 */
export class ByteStringError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, operation: string) {
    super(`${operation} failed with ${errorName(code)} (${code}).`);
    this.name = 'ByteStringError';
    this.code = code;
  }
}

/**
 * Throw ByteStringError unless `code` is NONE.
 *
 *   assertOk(str.insert(0, bytes), 'insert');
 */
export function assertOk(code: ErrorCode, operation: string): void {
  if (code !== ErrorCode.NONE) {
    throw new ByteStringError(code, operation);
  }
}
