/**
 * @dynbytes/core — type definitions
 *
 * The block IS the truth; these types describe how callers talk to it.
 */

import type { ErrorCode } from './errors';

// ─── Attach Policy ────────────────────────────────────────────────────────────

/**
 * How ByteString.attach() treats the declared size of a caller buffer.
 *
 * zero-size:          content is empty regardless of what the buffer holds.
 *                     A terminator is written at data[0].
 * size-terminator:    content is the first `size` data bytes. The terminator
 *                     must already sit at data[size]; attach fails otherwise.
 * size-no-terminator: content is the first `size` data bytes. attach writes
 *                     the terminator at data[size].
 */
export type AttachMode = 'zero-size' | 'size-terminator' | 'size-no-terminator';

// ─── Replace Strategy ─────────────────────────────────────────────────────────

/**
 * Strategy for a replace whose replacement is longer than the pattern.
 *
 * dual:     pass 1 locates every occurrence and sizes the result exactly;
 *           growth happens once, up front. Fails without touching content.
 * straight: replaces occurrence by occurrence, growing as it goes. If growth
 *           fails midway the already-replaced prefix stays in place and the
 *           original content is NOT restored.
 */
export type ReplaceMode = 'dual' | 'straight';

export interface ReplaceOptions {
  /** Scan from `left` towards `right` (default) or the reverse. */
  readonly fromLeft?: boolean;
  readonly mode?:     ReplaceMode;
}

export interface CountOptions {
  /** Count overlapping occurrences ("aa" in "aaa" → 2 instead of 1). */
  readonly overlapped?: boolean;
  readonly fromLeft?:   boolean;
}

// ─── Results ──────────────────────────────────────────────────────────────────

/**
 * Outcome of a search. `index` is NOT_FOUND both when nothing matched and
 * when the call was invalid; check `error` to tell the two apart.
 */
export interface SearchResult {
  readonly index: number;
  readonly error: ErrorCode;
}

/** `count` is NOT_FOUND when `error` is not NONE. */
export interface CountResult {
  readonly count: number;
  readonly error: ErrorCode;
}

/**
 * 'greater' and 'smaller' are reserved for ordering comparisons; compare()
 * only reports equality.
 */
export type CompareResult = 'equal' | 'non-equal' | 'greater' | 'smaller' | 'error';

export interface CompareOutcome {
  readonly result: CompareResult;
  readonly error:  ErrorCode;
}
