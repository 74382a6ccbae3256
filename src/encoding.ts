/**
 * Latin-1 conversion between JS strings and byte content.
 *
 * Each UTF-16 code unit 0..255 maps to the byte of the same value, so any
 * byte sequence round-trips. Code units above 255 have no byte and are
 * rejected rather than truncated.
 */

// String.fromCharCode spreads its arguments; keep each call well under the
// engine's argument limit.
const DECODE_CHUNK = 0x2000;

export function latin1Bytes(text: string): Uint8Array {
  const out = new Uint8Array(text.length);
  for (let i = 0; i < text.length; i++) {
    const unit = text.charCodeAt(i);
    if (unit > 0xff) {
      throw new RangeError(
        `latin1Bytes: code unit 0x${unit.toString(16)} at index ${i} is not a byte.`,
      );
    }
    out[i] = unit;
  }
  return out;
}

export function latin1String(bytes: Uint8Array): string {
  let text = '';
  for (let i = 0; i < bytes.length; i += DECODE_CHUNK) {
    text += String.fromCharCode(...bytes.subarray(i, i + DECODE_CHUNK));
  }
  return text;
}
