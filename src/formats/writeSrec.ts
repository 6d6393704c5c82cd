import { AddressRangeError, UnsupportedTypeError } from '../errors.js';
import { packSrec } from '../records/srec.js';
import type { ImageView, WriteRecordsOptions } from './types.js';

const DATA_TYPES: Record<number, { data: '1' | '2' | '3'; start: '9' | '8' | '7' }> = {
  16: { data: '1', start: '9' },
  24: { data: '2', start: '8' },
  32: { data: '3', start: '7' },
};

/**
 * Create Motorola S-Records of all data in `image`.
 *
 * Output is an optional `S0` header, the data records, an `S5` (or `S6` above 0xFFFF records) count
 * and, when set, the start address record matching the address length.
 */
export function writeSrec(image: ImageView, opts?: WriteRecordsOptions): string {
  const numberOfDataBytes = opts?.numberOfDataBytes ?? 32;
  const addressLengthBits = opts?.addressLengthBits ?? 32;
  const types = DATA_TYPES[addressLengthBits];
  if (types === undefined) {
    throw new UnsupportedTypeError(
      `expected data record type 1..3, but got ${Math.floor(addressLengthBits / 8) - 1}`,
    );
  }

  const lines: string[] = [];
  if (image.header !== undefined) {
    lines.push(packSrec('0', 0, image.header.length, image.header));
  }

  const numberOfDataWords = Math.max(1, Math.floor(numberOfDataBytes / image.wordSizeBytes));
  let numberOfRecords = 0;
  for (const { address, data } of image.segments.chunks(numberOfDataWords)) {
    lines.push(packSrec(types.data, address, data.length, data));
    numberOfRecords++;
  }

  if (numberOfRecords <= 0xffff) {
    lines.push(packSrec('5', numberOfRecords, 0));
  } else if (numberOfRecords <= 0xffffff) {
    lines.push(packSrec('6', numberOfRecords, 0));
  } else {
    throw new AddressRangeError(`too many records ${numberOfRecords}`);
  }

  if (image.executionStartAddress !== undefined) {
    lines.push(packSrec(types.start, image.executionStartAddress, 0));
  }

  return lines.join('\n') + '\n';
}
