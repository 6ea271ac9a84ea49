/**
 * Signed varint codec for ledger values.
 *
 * Zig-zag maps the sign into the low bit, then the value is written in
 * little-endian groups of 7 bits with the high bit set on every byte but the
 * last. At most 10 bytes for a 64-bit value.
 */
import { LedgerDecodeError } from './errors.js';

export const MAX_VARINT_LENGTH = 10;

const INT64_MIN = -(1n << 63n);
const INT64_MAX = (1n << 63n) - 1n;

export function encodeVarint(value: bigint): Buffer {
  if (value < INT64_MIN || value > INT64_MAX) {
    throw new RangeError(`Value ${value} does not fit in a signed 64-bit integer`);
  }

  let ux = BigInt.asUintN(64, value << 1n);
  if (value < 0n) ux = BigInt.asUintN(64, ~ux);

  const bytes: number[] = [];
  while (ux >= 0x80n) {
    bytes.push(Number(ux & 0x7fn) | 0x80);
    ux >>= 7n;
  }
  bytes.push(Number(ux));
  return Buffer.from(bytes);
}

/** Decode exactly one varint spanning the whole buffer. */
export function decodeVarint(bytes: Uint8Array): bigint {
  if (bytes.length === 0) {
    throw new LedgerDecodeError('empty value');
  }

  let ux = 0n;
  let shift = 0n;
  for (let i = 0; i < bytes.length; i++) {
    if (i === MAX_VARINT_LENGTH) {
      throw new LedgerDecodeError('varint overflows a 64-bit integer');
    }
    const b = bytes[i];
    if (b < 0x80) {
      if (i === MAX_VARINT_LENGTH - 1 && b > 1) {
        throw new LedgerDecodeError('varint overflows a 64-bit integer');
      }
      if (i !== bytes.length - 1) {
        throw new LedgerDecodeError(`${bytes.length - i - 1} trailing byte(s) after varint`);
      }
      ux |= BigInt(b) << shift;
      const x = ux >> 1n;
      return (ux & 1n) === 1n ? ~x : x;
    }
    ux |= BigInt(b & 0x7f) << shift;
    shift += 7n;
  }

  throw new LedgerDecodeError('truncated varint');
}
