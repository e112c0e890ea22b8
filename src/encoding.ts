import { Buffer } from "node:buffer";
import { crc32 } from "./crc32.js";
import { UnsupportedTypeError, describeType } from "./errors.js";

/**
 * ┌───────────┬───────────────┬──────────────┬────────────────┬─────────────┬───────────────┐
 * │ crc32(4B) │ timestamp(4B) │ key_size(4B) │ value_size(4B) │ key_type(2B)│ value_type(2B)│
 * └───────────┴───────────────┴──────────────┴────────────────┴─────────────┴───────────────┘
 *
 * Every field is little-endian. The checksum covers everything after itself:
 * the 16 byte header followed by the key and value payloads.
 */
export const CRC_SIZE = 4;
export const HEADER_SIZE = 16;
export const RECORD_PREFIX_SIZE = CRC_SIZE + HEADER_SIZE;

export enum ValueType {
  Text = 1,
  SignedInteger = 2,
  Float64 = 3,
}

export type TypedValue =
  | { type: ValueType.Text; value: string }
  | { type: ValueType.SignedInteger; value: bigint }
  | { type: ValueType.Float64; value: number };

export type Scalar = string | number | bigint;

export type RecordHeader = {
  timestamp: number;
  keySize: number;
  valueSize: number;
  /** Raw tag; may be outside {@link ValueType} when read from a damaged file. */
  keyType: number;
  valueType: number;
};

export type DecodedRecord = {
  timestamp: number;
  key: TypedValue;
  value: TypedValue;
};

export function text(value: string): TypedValue {
  return { type: ValueType.Text, value };
}

export function int(value: bigint | number): TypedValue {
  return { type: ValueType.SignedInteger, value: BigInt(value) };
}

export function float(value: number): TypedValue {
  return { type: ValueType.Float64, value };
}

function isTypedValue(input: object): input is TypedValue {
  if (!("type" in input) || !("value" in input)) {
    return false;
  }

  switch (input.type) {
    case ValueType.Text:
      return typeof input.value === "string";
    case ValueType.SignedInteger:
      return typeof input.value === "bigint";
    case ValueType.Float64:
      return typeof input.value === "number";
    default:
      return false;
  }
}

/**
 * Resolve a caller value to its tagged form. Numbers that are safe integers
 * become SignedInteger; every other number (fractions, -0, NaN, infinities)
 * stays Float64. Wrap with {@link float} to store an integral float.
 */
export function toTypedValue(input: unknown): TypedValue {
  switch (typeof input) {
    case "string":
      return text(input);
    case "bigint":
      return int(input);
    case "number":
      return Number.isSafeInteger(input) && !Object.is(input, -0)
        ? int(input)
        : float(input);
    case "object":
      if (input !== null && isTypedValue(input)) {
        return input;
      }
  }

  throw new UnsupportedTypeError(describeType(input));
}

export function encodeValue(input: TypedValue): Buffer {
  switch (input.type) {
    case ValueType.Text:
      return Buffer.from(input.value, "utf8");
    case ValueType.SignedInteger: {
      const buff = Buffer.alloc(8);
      buff.writeBigInt64LE(input.value);
      return buff;
    }
    case ValueType.Float64: {
      const buff = Buffer.alloc(8);
      buff.writeDoubleLE(input.value);
      return buff;
    }
  }
}

/**
 * Invalid UTF-8 in a text payload is not rejected; Node substitutes U+FFFD
 * for the bad sequences.
 */
export function decodeValue(bytes: Buffer, type: number): TypedValue {
  switch (type) {
    case ValueType.Text:
      return text(bytes.toString("utf8"));
    case ValueType.SignedInteger:
      return { type: ValueType.SignedInteger, value: bytes.readBigInt64LE(0) };
    case ValueType.Float64:
      return float(bytes.readDoubleLE(0));
    default:
      throw new UnsupportedTypeError(`type tag ${type}`);
  }
}

export function encodeHeader(
  buff: Buffer,
  offset: number,
  header: RecordHeader,
) {
  buff.writeUInt32LE(header.timestamp, offset);
  buff.writeUInt32LE(header.keySize, offset + 4);
  buff.writeUInt32LE(header.valueSize, offset + 8);
  buff.writeUInt16LE(header.keyType, offset + 12);
  buff.writeUInt16LE(header.valueType, offset + 14);
}

export function decodeHeader(buffer: Buffer, offset: number): RecordHeader {
  return {
    timestamp: buffer.readUInt32LE(offset),
    keySize: buffer.readUInt32LE(offset + 4),
    valueSize: buffer.readUInt32LE(offset + 8),
    keyType: buffer.readUInt16LE(offset + 12),
    valueType: buffer.readUInt16LE(offset + 14),
  };
}

/** Integer and float payloads are always 8 bytes; text has any length. */
function payloadFits(type: number, size: number): boolean {
  return type === ValueType.SignedInteger || type === ValueType.Float64
    ? size === 8
    : true;
}

export function recordSize(header: RecordHeader): number {
  return RECORD_PREFIX_SIZE + header.keySize + header.valueSize;
}

/**
 * Encode one record. The returned buffer's length is the number of bytes the
 * record occupies in the log.
 */
export function encodeRecord(
  timestamp: number,
  key: Scalar | TypedValue,
  value: Scalar | TypedValue,
): Buffer {
  const typedKey = toTypedValue(key);
  const typedValue = toTypedValue(value);
  const keyBytes = encodeValue(typedKey);
  const valueBytes = encodeValue(typedValue);

  const header: RecordHeader = {
    timestamp,
    keySize: keyBytes.length,
    valueSize: valueBytes.length,
    keyType: typedKey.type,
    valueType: typedValue.type,
  };

  const buff = Buffer.alloc(recordSize(header));

  encodeHeader(buff, CRC_SIZE, header);
  keyBytes.copy(buff, RECORD_PREFIX_SIZE);
  valueBytes.copy(buff, RECORD_PREFIX_SIZE + keyBytes.length);
  buff.writeUInt32LE(crc32(buff.subarray(CRC_SIZE)), 0);

  return buff;
}

/**
 * Decode exactly one record. Returns `null` when the checksum does not match
 * or the header's lengths cannot frame the given bytes or the typed payloads.
 */
export function decodeRecord(buff: Buffer): DecodedRecord | null {
  if (buff.length < RECORD_PREFIX_SIZE) {
    return null;
  }

  if (buff.readUInt32LE(0) !== crc32(buff.subarray(CRC_SIZE))) {
    return null;
  }

  const header = decodeHeader(buff, CRC_SIZE);

  if (
    recordSize(header) !== buff.length ||
    !payloadFits(header.keyType, header.keySize) ||
    !payloadFits(header.valueType, header.valueSize)
  ) {
    return null;
  }

  const valueStart = RECORD_PREFIX_SIZE + header.keySize;

  return {
    timestamp: header.timestamp,
    key: decodeValue(
      buff.subarray(RECORD_PREFIX_SIZE, valueStart),
      header.keyType,
    ),
    value: decodeValue(
      buff.subarray(valueStart, valueStart + header.valueSize),
      header.valueType,
    ),
  };
}
