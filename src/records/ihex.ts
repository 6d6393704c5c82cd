import { AddressRangeError, ChecksumError, ParseError } from '../errors.js';
import { bytesToHex, hexToBytes, isHex, toHex, toHexByte } from './hex.js';

/**
 * Intel HEX record types.
 */
export const IhexTypes = {
  Data: 0x00,
  EndOfFile: 0x01,
  ExtendedSegmentAddress: 0x02,
  StartSegmentAddress: 0x03,
  ExtendedLinearAddress: 0x04,
  StartLinearAddress: 0x05,
} as const;

export interface IhexRecord {
  type: number;
  address: number;
  size: number;
  data: Uint8Array;
}

/**
 * Two's complement of the byte sum of `hexstr`, masked to 8 bits.
 *
 * Appending it makes the whole record sum to zero modulo 256.
 */
export function crcIhex(hexstr: string): number {
  let sum = 0;
  for (const b of hexToBytes(hexstr)) sum += b;
  return (0x100 - (sum & 0xff)) & 0xff;
}

/**
 * Pack the given fields into an Intel HEX line (without line ending).
 */
export function packIhex(type: number, address: number, size: number, data?: Uint8Array): string {
  if (address < 0 || address > 0xffff) {
    throw new AddressRangeError(`record address 0x${address.toString(16)} exceeds 0xffff`);
  }
  if (size < 0 || size > 0xff) {
    throw new AddressRangeError(`record data size ${size} exceeds 255 bytes`);
  }
  let line = `${toHexByte(size)}${toHex(address, 4)}${toHexByte(type)}`;
  if (data && data.length > 0) line += bytesToHex(data);
  return `:${line}${toHexByte(crcIhex(line))}`;
}

/**
 * Parse one Intel HEX line and verify its checksum.
 *
 * The record type is returned as read; interpreting it is up to the reader.
 */
export function unpackIhex(record: string): IhexRecord {
  // Minimum is :SSAAAATTCC.
  if (record.length < 11) throw new ParseError(`record '${record}' too short`);
  if (record[0] !== ':') throw new ParseError(`record '${record}' not starting with a ':'`);

  const body = record.slice(1);
  if (body.length % 2 !== 0 || !isHex(body)) {
    throw new ParseError(`record '${record}' is not valid hex`);
  }
  const value = hexToBytes(body);

  const size = value[0] ?? 0;
  if (size !== value.length - 5) throw new ParseError(`record '${record}' has wrong size`);

  const address = ((value[1] ?? 0) << 8) | (value[2] ?? 0);
  const type = value[3] ?? 0;
  const data = value.slice(4, value.length - 1);
  const actual = value[value.length - 1] ?? 0;
  const expected = crcIhex(record.slice(1, -2));

  if (actual !== expected) {
    throw new ChecksumError(
      `expected crc '${toHexByte(expected)}' in record ${record}, but got '${toHexByte(actual)}'`,
      expected,
      actual,
    );
  }

  return { type, address, size, data };
}
