/**
 * @dynbytes/core — Compare & Count Tests
 */

import { describe, it, expect } from 'vitest';
import {
  ByteString,
  ErrorCode,
  NOT_FOUND,
  assertOk,
  errorName,
  latin1Bytes,
} from '../src/index';

// ─── helpers ─────────────────────────────────────────────────────────────────

const bytes = latin1Bytes;

function owned(content: string): ByteString {
  const made = ByteString.create(content.length);
  if (!made.ok) throw new Error(`create failed: ${errorName(made.error)}`);
  assertOk(made.string.insert(0, bytes(content)), 'insert');
  return made.string;
}

// ─── compare ─────────────────────────────────────────────────────────────────

describe('compare', () => {
  const str = owned('hello');

  it('partial compares only the length of the input', () => {
    expect(str.compare(0, bytes('hel'), true)).toEqual({ result: 'equal', error: ErrorCode.NONE });
    expect(str.compare(1, bytes('ex'), true)).toEqual({ result: 'non-equal', error: ErrorCode.NONE });
  });

  it('full compare also requires the content to end with the input', () => {
    expect(str.compare(0, bytes('hel'), false).result).toBe('non-equal');
    expect(str.compare(0, bytes('hello'), false).result).toBe('equal');
    expect(str.compare(3, bytes('lo'), false).result).toBe('equal');
    expect(str.compare(3, bytes('la'), false).result).toBe('non-equal');
  });

  it('reports invalid calls through error', () => {
    expect(str.compare(5, bytes('x'), true)).toEqual({ result: 'error', error: ErrorCode.BIG_LEFT });
    expect(str.compare(3, bytes('lol'), true)).toEqual({ result: 'error', error: ErrorCode.BIG_COUNT });
    expect(str.compare(0, null, true)).toEqual({ result: 'error', error: ErrorCode.ITEMS });
    expect(str.compare(0, new Uint8Array(0), true)).toEqual({ result: 'error', error: ErrorCode.ZERO_COUNT });
  });
});

// ─── count ───────────────────────────────────────────────────────────────────

describe('count', () => {
  it('counts "ll" in "llll" with and without overlap', () => {
    const str = owned('llll');
    const ll  = bytes('ll');
    expect(str.count(0, 3, ll)).toEqual({ count: 2, error: ErrorCode.NONE });
    expect(str.count(0, 3, ll, { overlapped: true })).toEqual({ count: 3, error: ErrorCode.NONE });
  });

  it('gives the same totals scanning from the right', () => {
    const str = owned('aaaaa');
    const aa  = bytes('aa');
    expect(str.count(0, 4, aa).count).toBe(2);
    expect(str.count(0, 4, aa, { fromLeft: false }).count).toBe(2);
    expect(str.count(0, 4, aa, { overlapped: true }).count).toBe(4);
    expect(str.count(0, 4, aa, { overlapped: true, fromLeft: false }).count).toBe(4);
  });

  it('counts only occurrences that fit inside the window', () => {
    const str = owned('abcabcab');
    const ab  = bytes('ab');
    expect(str.count(0, 7, ab).count).toBe(3);
    expect(str.count(0, 6, ab).count).toBe(2);
    expect(str.count(1, 7, ab).count).toBe(2);
    expect(str.count(0, 7, bytes('ca')).count).toBe(2);
    expect(str.count(0, 7, bytes('x')).count).toBe(0);
  });

  it('reports NOT_FOUND as the count on error', () => {
    const str = owned('abc');
    expect(str.count(0, 1, bytes('abc'))).toEqual({ count: NOT_FOUND, error: ErrorCode.BIG_COUNT });
    expect(str.count(0, 3, bytes('a'))).toEqual({ count: NOT_FOUND, error: ErrorCode.BIG_RIGHT });
  });
});
