import { WireError } from "./errors";
import { readVarint, varintToNumber } from "./varint";

export enum WireType {
  Varint = 0,
  Fixed64 = 1,
  LengthDelimited = 2,
  Fixed32 = 5,
}

interface FieldBase {
  fieldNumber: number;
  /** Byte offset of the field's tag within the decoded message. */
  offset: number;
}

export interface VarintField extends FieldBase {
  wireType: WireType.Varint;
  value: bigint;
}

export interface FixedField extends FieldBase {
  wireType: WireType.Fixed32 | WireType.Fixed64;
  value: bigint;
}

export interface LengthDelimitedField extends FieldBase {
  wireType: WireType.LengthDelimited;
  /** A view into the source buffer; the caller decides whether it is text, bytes or a message. */
  value: Uint8Array;
}

export type DecodedField = VarintField | FixedField | LengthDelimitedField;

function readSlice(
  bytes: Uint8Array,
  fieldOffset: number,
  start: number,
  length: number
): Uint8Array {
  const remaining = bytes.length - start;
  if (length > remaining) {
    throw WireError.truncatedMessage(fieldOffset, length, remaining);
  }
  return bytes.subarray(start, start + length);
}

function readFixed(bytes: Uint8Array, width: 4 | 8): bigint {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  return width === 4
    ? BigInt(view.getUint32(0, true))
    : view.getBigUint64(0, true);
}

/**
 * Walks every field of one protobuf message body, in order.
 * Unknown field numbers are yielded like known ones; interpreting them is
 * left to the caller. Each call starts again from the beginning of `bytes`.
 */
export function* decodeFields(
  bytes: Uint8Array
): Generator<DecodedField, void, undefined> {
  let offset = 0;

  while (offset < bytes.length) {
    const fieldOffset = offset;
    const tag = readVarint(bytes, offset);
    offset = tag.offset;

    const wireType = Number(tag.value & 0x7n);
    const fieldNumber = varintToNumber(tag.value >> 3n);
    if (fieldNumber === 0) {
      throw WireError.invalidTag(fieldOffset);
    }

    switch (wireType) {
      case WireType.Varint: {
        const result = readVarint(bytes, offset);
        offset = result.offset;
        yield {
          fieldNumber,
          offset: fieldOffset,
          wireType: WireType.Varint,
          value: result.value,
        };
        break;
      }
      case WireType.LengthDelimited: {
        const length = readVarint(bytes, offset);
        offset = length.offset;
        const value = readSlice(
          bytes,
          fieldOffset,
          offset,
          varintToNumber(length.value)
        );
        offset += value.length;
        yield {
          fieldNumber,
          offset: fieldOffset,
          wireType: WireType.LengthDelimited,
          value,
        };
        break;
      }
      case WireType.Fixed32:
      case WireType.Fixed64: {
        const fixedType =
          wireType === WireType.Fixed32 ? WireType.Fixed32 : WireType.Fixed64;
        const width = fixedType === WireType.Fixed32 ? 4 : 8;
        const raw = readSlice(bytes, fieldOffset, offset, width);
        offset += width;
        yield {
          fieldNumber,
          offset: fieldOffset,
          wireType: fixedType,
          value: readFixed(raw, width),
        };
        break;
      }
      default:
        // Groups (3, 4) are deprecated and 6, 7 are unassigned.
        throw WireError.unsupportedWireType(fieldOffset, wireType);
    }
  }
}
