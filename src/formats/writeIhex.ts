import { AddressRangeError, UnsupportedTypeError } from '../errors.js';
import { uintToBytes } from '../records/hex.js';
import { IhexTypes, packIhex } from '../records/ihex.js';
import type { ImageView, IhexAddressLength, WriteRecordsOptions } from './types.js';

const I8HEX_MAX = 0xffff;
const I16HEX_MAX = 16 * 0xffff + 0xffff;
const I32HEX_MAX = 0xffffffff;

/**
 * Extended-address state of one writer pass.
 *
 * Chunks arrive in ascending address order, so each register only ever moves forward.
 */
interface ExtendedAddressState {
  segment: number;
  linear: number;
}

function isAddressLength(bits: number): bits is IhexAddressLength {
  return bits === 16 || bits === 24 || bits === 32;
}

function extendedRecord(type: number, value: number): string {
  return packIhex(type, 0, 2, uintToBytes(value, 2));
}

/**
 * Map `address` to a 16-bit record address, emitting extended records into `lines` as needed.
 */
function recordAddress(
  mode: IhexAddressLength,
  address: number,
  state: ExtendedAddressState,
  lines: string[],
): number {
  switch (mode) {
    case 16:
      if (address > I8HEX_MAX) {
        throw new AddressRangeError(
          'cannot address more than 64 kB in I8HEX files (16 bits addresses)',
        );
      }
      return address;
    case 24: {
      if (address > I16HEX_MAX) {
        throw new AddressRangeError(
          'cannot address more than 1 MB in I16HEX files (20 bits addresses)',
        );
      }
      let lower = address - 16 * state.segment;
      if (lower > 0xffff) {
        state.segment = Math.min(4096 * Math.floor(address / 0x10000), 0xffff);
        lower = address - 16 * state.segment;
        lines.push(extendedRecord(IhexTypes.ExtendedSegmentAddress, state.segment));
      }
      return lower;
    }
    case 32: {
      if (address > I32HEX_MAX) {
        throw new AddressRangeError(
          'cannot address more than 4 GB in I32HEX files (32 bits addresses)',
        );
      }
      const upper = Math.floor(address / 0x10000);
      if (upper > state.linear) {
        state.linear = upper;
        lines.push(extendedRecord(IhexTypes.ExtendedLinearAddress, upper));
      }
      return address % 0x10000;
    }
  }
}

/**
 * Create Intel HEX records of all data in `image`.
 *
 * - 16 bits: data and EOF records only (I8HEX).
 * - 24 bits: extended segment address records, start segment address footer (I16HEX).
 * - 32 bits: extended linear address records, start linear address footer (I32HEX).
 */
export function writeIhex(image: ImageView, opts?: WriteRecordsOptions): string {
  const numberOfDataBytes = opts?.numberOfDataBytes ?? 32;
  const addressLengthBits = opts?.addressLengthBits ?? 32;
  if (!isAddressLength(addressLengthBits)) {
    throw new UnsupportedTypeError(
      `expected address length 16, 24 or 32, but got ${addressLengthBits}`,
    );
  }

  const lines: string[] = [];
  const state: ExtendedAddressState = { segment: 0, linear: 0 };
  const numberOfDataWords = Math.max(1, Math.floor(numberOfDataBytes / image.wordSizeBytes));

  for (const { address, data } of image.segments.chunks(numberOfDataWords)) {
    const lower = recordAddress(addressLengthBits, address, state, lines);
    lines.push(packIhex(IhexTypes.Data, lower, data.length, data));
  }

  if (image.executionStartAddress !== undefined) {
    const start = uintToBytes(image.executionStartAddress, 4);
    if (addressLengthBits === 24) {
      lines.push(packIhex(IhexTypes.StartSegmentAddress, 0, 4, start));
    } else if (addressLengthBits === 32) {
      lines.push(packIhex(IhexTypes.StartLinearAddress, 0, 4, start));
    }
  }

  lines.push(packIhex(IhexTypes.EndOfFile, 0, 0));
  return lines.join('\n') + '\n';
}
