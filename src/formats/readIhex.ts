import { ParseError } from '../errors.js';
import { Segment } from '../memory/segment.js';
import { bytesToUint } from '../records/hex.js';
import { IhexTypes, unpackIhex } from '../records/ihex.js';
import { recordLines } from '../records/lines.js';
import type { ImageState } from './types.js';

/**
 * Add Intel HEX records to `image`. Blank lines are ignored and reading stops at the EOF record.
 *
 * Extended segment (`02`, value × 16) and extended linear (`04`, value × 65536) registers live for
 * the duration of one call and are added to every following data record address.
 */
export function readIhex(image: ImageState, records: string, overwrite = false): void {
  let extendedSegmentAddress = 0;
  let extendedLinearAddress = 0;

  for (const line of recordLines(records)) {
    const { type, address, data } = unpackIhex(line);
    switch (type) {
      case IhexTypes.Data: {
        const wordAddress = address + extendedSegmentAddress + extendedLinearAddress;
        const min = wordAddress * image.wordSizeBytes;
        image.segments.add(new Segment(min, min + data.length, data, image.wordSizeBytes), overwrite);
        break;
      }
      case IhexTypes.EndOfFile:
        return;
      case IhexTypes.ExtendedSegmentAddress:
        extendedSegmentAddress = bytesToUint(data) * 16;
        break;
      case IhexTypes.ExtendedLinearAddress:
        extendedLinearAddress = bytesToUint(data) * 0x10000;
        break;
      case IhexTypes.StartSegmentAddress:
      case IhexTypes.StartLinearAddress:
        image.executionStartAddress = bytesToUint(data);
        break;
      default:
        throw new ParseError(`expected type 1..5 in record ${line}, but got ${type}`);
    }
  }
}
