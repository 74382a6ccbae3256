/**
 * @dynbytes/core — Replace Tests
 *
 * In-place, dual-pass and straight replacement; growth on owned and attached
 * strings; aliasing against the content before and after growth.
 */

import { describe, it, expect } from 'vitest';
import {
  ByteString,
  ErrorCode,
  DATA_START,
  METADATA_SIZE,
  assertOk,
  errorName,
  latin1Bytes,
  type Allocator,
  type ReplaceMode,
  type ReplaceOptions,
} from '../src/index';

// ─── helpers ─────────────────────────────────────────────────────────────────

const bytes = latin1Bytes;

function owned(content: string, capacity = content.length, allocator?: Allocator): ByteString {
  const made = ByteString.create(capacity, allocator);
  if (!made.ok) throw new Error(`create failed: ${errorName(made.error)}`);
  if (content.length > 0) assertOk(made.string.insert(0, bytes(content)), 'insert');
  return made.string;
}

function attached(content: string, buffer: Uint8Array): ByteString {
  const made = ByteString.attach(buffer);
  if (!made.ok) throw new Error(`attach failed: ${errorName(made.error)}`);
  if (content.length > 0) assertOk(made.string.insert(0, bytes(content)), 'insert');
  return made.string;
}

function callerBuffer(capacity: number): Uint8Array {
  return new Uint8Array(METADATA_SIZE + capacity + 1);
}

function blockOf(str: ByteString): Uint8Array {
  const block = str.block;
  if (block === null) throw new Error('string is destroyed');
  return block;
}

const MODES: ReplaceMode[] = ['dual', 'straight'];

// ─── growth ──────────────────────────────────────────────────────────────────

describe('growing replace', () => {
  it.each(MODES)('%s: grows an owned string to the exact result size', (mode) => {
    const str = owned('aaa', 3);
    expect(str.replace(0, 2, bytes('a'), bytes('bb'), { mode })).toBe(ErrorCode.NONE);
    expect(str.latin1()).toBe('bbbbbb');
    expect(str.size).toBe(6);
    expect(str.capacity).toBe(6);
    expect(blockOf(str)[DATA_START + 6]).toBe(0);
  });

  it('rejects growth past an attached capacity and leaves the content', () => {
    const str = attached('aaa', callerBuffer(4));
    expect(str.replace(0, 2, bytes('a'), bytes('bb'))).toBe(ErrorCode.ATTACHED);
    expect(str.latin1()).toBe('aaa');
    expect(str.capacity).toBe(4);
  });

  it('ignores buffer bytes beyond the declared capacity', () => {
    const big = new Uint8Array(64);
    const str = attached('aaa', big.subarray(0, METADATA_SIZE + 4 + 1));
    expect(str.replace(0, 2, bytes('a'), bytes('bb'))).toBe(ErrorCode.ATTACHED);
    expect(str.latin1()).toBe('aaa');
  });

  it('grows inside an attached string while the result fits', () => {
    const str = attached('a.b', callerBuffer(8));
    expect(str.replace(0, 2, bytes('.'), bytes('::'))).toBe(ErrorCode.NONE);
    expect(str.latin1()).toBe('a::b');
    expect(str.capacity).toBe(8);
  });

  it.each(MODES)('%s: expands separators', (mode) => {
    const str = owned('a,b,,c');
    expect(str.replace(0, 5, bytes(','), bytes(', '), { mode })).toBe(ErrorCode.NONE);
    expect(str.latin1()).toBe('a, b, , c');
  });

  it.each(MODES)('%s: replaces only inside the window', (mode) => {
    const str = owned('aXbXcX');
    expect(str.replace(0, 2, bytes('X'), bytes('YY'), { mode })).toBe(ErrorCode.NONE);
    expect(str.latin1()).toBe('aYYbXcX');
  });

  it.each(MODES)('%s: picks occurrences by scan direction', (mode) => {
    const left  = owned('ababa');
    const right = owned('ababa');
    left.replace(0, 4, bytes('aba'), bytes('XYZW'), { mode });
    right.replace(0, 4, bytes('aba'), bytes('XYZW'), { mode, fromLeft: false });
    expect(left.latin1()).toBe('XYZWba');
    expect(right.latin1()).toBe('abXYZW');
  });

  it('does not grow when nothing matches', () => {
    const str = owned('hello');
    expect(str.replace(0, 4, bytes('z'), bytes('zz'))).toBe(ErrorCode.NONE);
    expect(str.capacity).toBe(5);
    expect(str.latin1()).toBe('hello');
  });
});

// ─── growth failures ─────────────────────────────────────────────────────────

describe('growth failures', () => {
  const noRealloc: Allocator = {
    allocate: (n) => new Uint8Array(n),
    free:     (block) => { block.fill(0); },
  };

  it.each(MODES)('%s: REALLOC_FUNC before any hit is replaced', (mode) => {
    const str = owned('a.b.c', 5, noRealloc);
    expect(str.replace(0, 4, bytes('.'), bytes('...'), { mode })).toBe(ErrorCode.REALLOC_FUNC);
    expect(str.latin1()).toBe('a.b.c');
  });

  it('dual: ALLOCATION leaves the content and block untouched', () => {
    const str = owned('a.b.c', 5, { ...noRealloc, reallocate: () => null });
    const old = blockOf(str);
    expect(str.replace(0, 4, bytes('.'), bytes('...'))).toBe(ErrorCode.ALLOCATION);
    expect(str.block).toBe(old);
    expect(str.latin1()).toBe('a.b.c');
  });

  it('dual: an attached overflow replaces nothing', () => {
    const str = attached('a.b.c', callerBuffer(7));
    expect(str.replace(0, 4, bytes('.'), bytes('...'))).toBe(ErrorCode.ATTACHED);
    expect(str.latin1()).toBe('a.b.c');
  });

  it('straight: an attached overflow keeps the hits already replaced', () => {
    const str = attached('a.b.c', callerBuffer(7));
    expect(str.replace(0, 4, bytes('.'), bytes('...'), { mode: 'straight' })).toBe(ErrorCode.ATTACHED);
    expect(str.latin1()).toBe('a...b.c');
    expect(str.size).toBe(7);
    expect(blockOf(str)[DATA_START + 7]).toBe(0);
  });

  it('straight: scanning from the right keeps the hits already replaced', () => {
    const str = attached('a.b.c', callerBuffer(7));
    expect(str.replace(0, 4, bytes('.'), bytes('...'), { mode: 'straight', fromLeft: false }))
      .toBe(ErrorCode.ATTACHED);
    expect(str.latin1()).toBe('a.b...c');
    expect(str.size).toBe(7);
    expect(blockOf(str)[DATA_START + 7]).toBe(0);
  });
});

// ─── same size and shrinking ─────────────────────────────────────────────────

describe('in-place replace', () => {
  it('keeps size and capacity for an equal-length replacement', () => {
    const str = owned('hello world');
    expect(str.replace(0, 10, bytes('o'), bytes('0'))).toBe(ErrorCode.NONE);
    expect(str.latin1()).toBe('hell0 w0rld');
    expect(str.size).toBe(11);
    expect(str.capacity).toBe(11);
  });

  it('shrinks around each hit', () => {
    const str = owned('a--b--c');
    expect(str.replace(0, 6, bytes('--'), bytes('-'))).toBe(ErrorCode.NONE);
    expect(str.latin1()).toBe('a-b-c');
    expect(str.capacity).toBe(7);
  });

  it('removes hits when the replacement is null', () => {
    const str = owned('a--b--c');
    expect(str.replace(0, 6, bytes('--'), null)).toBe(ErrorCode.NONE);
    expect(str.latin1()).toBe('abc');
    expect(blockOf(str)[DATA_START + 3]).toBe(0);
  });

  it('picks overlapping occurrences by scan direction', () => {
    const left  = owned('aaa');
    const right = owned('aaa');
    left.replace(0, 2, bytes('aa'), bytes('b'));
    right.replace(0, 2, bytes('aa'), bytes('b'), { fromLeft: false });
    expect(left.latin1()).toBe('ba');
    expect(right.latin1()).toBe('ab');
  });

  it('agrees with remove for an empty replacement', () => {
    const removed  = owned('one, two, three');
    const replaced = owned('one, two, three');
    removed.remove(0, 14, bytes(', '));
    replaced.replace(0, 14, bytes(', '), new Uint8Array(0));
    expect(removed.latin1()).toBe('onetwothree');
    expect(replaced.latin1()).toBe('onetwothree');
  });
});

// ─── validation ──────────────────────────────────────────────────────────────

describe('replace validation', () => {
  it('rejects a pattern longer than the window', () => {
    expect(owned('hello').replace(0, 1, bytes('abc'), bytes('x'))).toBe(ErrorCode.BIG_COUNT);
  });

  it('rejects an unknown mode from an untyped caller', () => {
    const options: ReplaceOptions = JSON.parse('{"mode":"fast"}');
    const str = owned('abc');
    expect(str.replace(0, 2, bytes('b'), bytes('bb'), options)).toBe(ErrorCode.REPLACEMENT_TYPE);
    expect(str.latin1()).toBe('abc');
  });

  it('rejects input taken from the current content', () => {
    const str = owned('abab', 8);
    expect(str.replace(0, 3, str.data.subarray(0, 1), bytes('x'))).toBe(ErrorCode.OVERLAP);
    expect(str.replace(0, 3, bytes('a'), str.data.subarray(1, 2))).toBe(ErrorCode.OVERLAP);
  });

  describe('input in the slack the result would cover', () => {
    function setup() {
      const str   = owned('aab', 10);
      const block = blockOf(str);
      block.set(bytes('XY'), DATA_START + 5);
      return { str, after: block.subarray(DATA_START + 5, DATA_START + 7) };
    }

    it('dual: OVERLAP_REPLACE before touching the content', () => {
      const { str, after } = setup();
      expect(str.replace(0, 2, bytes('a'), after)).toBe(ErrorCode.OVERLAP_REPLACE);
      expect(str.latin1()).toBe('aab');
    });

    it('dual: vets a reallocated block before adopting it', () => {
      // Blocks are carved from one arena: the grown block lands on the input.
      const arena = new Uint8Array(256);
      const str   = owned('aaa', 3, {
        allocate:   (n) => arena.subarray(0, n),
        reallocate: (block, n) => {
          const next = arena.subarray(128, 128 + n);
          next.set(block.subarray(0, Math.min(block.byteLength, n)));
          return next;
        },
        free: (block) => { block.fill(0); },
      });
      const old   = blockOf(str);
      const after = arena.subarray(128 + DATA_START, 128 + DATA_START + 2);
      after.set(bytes('bb'));

      expect(str.replace(0, 2, bytes('a'), after)).toBe(ErrorCode.OVERLAP_REPLACE);
      expect(str.block).toBe(old);
      expect(str.capacity).toBe(3);
      expect(str.latin1()).toBe('aaa');
    });

    it('straight: OVERLAP_REPLACE once the content reaches the input', () => {
      const { str, after } = setup();
      expect(str.replace(0, 2, bytes('a'), after, { mode: 'straight' })).toBe(ErrorCode.OVERLAP_REPLACE);
      expect(str.latin1()).toBe('XYab');
    });
  });
});
