// ─── Types ────────────────────────────────────────────────────────────────────
export type {
  AttachMode,
  ReplaceMode,
  ReplaceOptions,
  CountOptions,
  SearchResult,
  CountResult,
  CompareResult,
  CompareOutcome,
} from './types';

// ─── Constants ────────────────────────────────────────────────────────────────
export {
  METADATA_SIZE,
  DATA_START,
  MAX_CAPACITY,
  NOT_FOUND,
  TERMINATOR,
  OFFSET_CAPACITY,
  OFFSET_SIZE,
  OFFSET_FLAGS,
  FLAG_ATTACHED,
  blockLength,
  capacityFor,
} from './constants';

// ─── Errors ───────────────────────────────────────────────────────────────────
export { ErrorCode, ByteStringError, errorName, assertOk } from './errors';

// ─── Allocation ───────────────────────────────────────────────────────────────
export { heapAllocator } from './allocator';
export type { Allocator } from './allocator';

// ─── Search primitives ────────────────────────────────────────────────────────
export {
  scanForward,
  scanReverse,
  horspoolForward,
  horspoolReverse,
  forwardShiftTable,
  reverseShiftTable,
} from './search';

// ─── Encoding ─────────────────────────────────────────────────────────────────
export { latin1Bytes, latin1String } from './encoding';

// ─── ByteString ───────────────────────────────────────────────────────────────
export { ByteString } from './bytestring';
export type { OpenResult } from './bytestring';
