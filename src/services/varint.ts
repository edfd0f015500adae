import { WireError } from "./errors";

/** A 64-bit varint never needs more than ten bytes. */
export const MAX_VARINT_BYTES = 10;

export interface VarintResult {
  value: bigint;
  /** Position of the first byte after the varint. */
  offset: number;
}

/**
 * Reads an unsigned base-128 varint starting at `offset`.
 * Each byte contributes its low 7 bits, least significant group first; a set
 * high bit means another byte follows.
 */
export function readVarint(bytes: Uint8Array, offset: number): VarintResult {
  let value = 0n;
  let shift = 0n;

  for (let i = 0; i < MAX_VARINT_BYTES; i++) {
    const position = offset + i;
    if (position >= bytes.length) {
      throw WireError.truncatedVarint(offset);
    }
    const byte = bytes[position];

    // The tenth byte only has room for bit 63.
    if (i === MAX_VARINT_BYTES - 1 && (byte & 0x7e) !== 0) {
      throw WireError.varintOverflow(offset);
    }

    value |= BigInt(byte & 0x7f) << shift;
    if ((byte & 0x80) === 0) {
      return { value, offset: position + 1 };
    }
    shift += 7n;
  }

  throw WireError.varintOverflow(offset);
}

/**
 * Narrows a varint used as a tag, length or enum to a JS number. Values past
 * `Number.MAX_SAFE_INTEGER` come back as `Infinity` so length checks fail.
 */
export function varintToNumber(value: bigint): number {
  return value > BigInt(Number.MAX_SAFE_INTEGER) ? Infinity : Number(value);
}
