import { AddressRangeError, ChecksumError, ParseError, UnsupportedTypeError } from '../errors.js';
import { bytesToHex, bytesToUint, hexToBytes, isHex, toHex, toHexByte } from './hex.js';

/**
 * Motorola S-Record type digit.
 *
 * - `0` header, `1`/`2`/`3` data with 16/24/32-bit address
 * - `5`/`6` record count, `7`/`8`/`9` start address with 32/24/16-bit address
 */
export type SrecType = '0' | '1' | '2' | '3' | '5' | '6' | '7' | '8' | '9';

export interface SrecRecord {
  type: SrecType;
  address: number;
  size: number;
  data: Uint8Array;
}

const ADDRESS_BYTES: Record<SrecType, number> = {
  '0': 2,
  '1': 2,
  '5': 2,
  '9': 2,
  '2': 3,
  '6': 3,
  '8': 3,
  '3': 4,
  '7': 4,
};

function isSrecType(type: string): type is SrecType {
  return Object.prototype.hasOwnProperty.call(ADDRESS_BYTES, type);
}

function sumBytes(bytes: Uint8Array): number {
  let sum = 0;
  for (const b of bytes) sum += b;
  return sum;
}

/**
 * One's complement of the byte sum of `hexstr` (count, address and data), masked to 8 bits.
 */
export function crcSrec(hexstr: string): number {
  return (sumBytes(hexToBytes(hexstr)) & 0xff) ^ 0xff;
}

/**
 * Pack the given fields into an S-Record line (without line ending).
 */
export function packSrec(
  type: string,
  address: number,
  size: number,
  data?: Uint8Array,
): string {
  if (!isSrecType(type)) {
    throw new UnsupportedTypeError(`expected record type 0..3 or 5..9, but got '${type}'`);
  }
  const addressBytes = ADDRESS_BYTES[type];
  if (address < 0 || address >= 2 ** (8 * addressBytes)) {
    throw new AddressRangeError(
      `address 0x${address.toString(16)} does not fit in an S${type} record ` +
        `(${8 * addressBytes} bits addresses)`,
    );
  }
  if (size < 0 || size + addressBytes + 1 > 0xff) {
    throw new AddressRangeError(
      `record data size ${size} exceeds ${0xff - addressBytes - 1} bytes in an S${type} record`,
    );
  }
  let line = toHexByte(size + addressBytes + 1) + toHex(address, 2 * addressBytes);
  if (data && data.length > 0) line += bytesToHex(data);
  return `S${type}${line}${toHexByte(crcSrec(line))}`;
}

/**
 * Parse one S-Record line and verify its checksum.
 */
export function unpackSrec(record: string): SrecRecord {
  // Minimum is STSSCC: type, byte count and checksum.
  if (record.length < 6) throw new ParseError(`record '${record}' too short`);
  if (record[0] !== 'S') throw new ParseError(`record '${record}' not starting with an 'S'`);

  const type = record.charAt(1);
  if (!isSrecType(type)) {
    throw new UnsupportedTypeError(`expected record type 0..3 or 5..9, but got '${type}'`);
  }

  const body = record.slice(2);
  if (body.length % 2 !== 0 || !isHex(body)) {
    throw new ParseError(`record '${record}' is not valid hex`);
  }
  const value = hexToBytes(body);

  const count = value[0] ?? 0;
  if (count !== value.length - 1) throw new ParseError(`record '${record}' has wrong size`);

  const addressBytes = ADDRESS_BYTES[type];
  const dataOffset = 1 + addressBytes;
  const address = bytesToUint(value.subarray(1, dataOffset));
  const data = value.slice(dataOffset, value.length - 1);
  const actual = value[value.length - 1] ?? 0;
  const expected = crcSrec(record.slice(2, -2));

  if (actual !== expected) {
    throw new ChecksumError(
      `expected crc '${toHexByte(expected)}' in record ${record}, but got '${toHexByte(actual)}'`,
      expected,
      actual,
    );
  }
  if (count < addressBytes + 1) throw new ParseError(`record '${record}' too short`);

  return { type, address, size: data.length, data };
}
