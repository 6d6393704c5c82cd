import { Segment } from '../memory/segment.js';
import { recordLines } from '../records/lines.js';
import { unpackSrec } from '../records/srec.js';
import type { ImageState } from './types.js';

/**
 * Add Motorola S-Records to `image`. Blank lines are ignored.
 *
 * - `S0` replaces the header.
 * - `S1`..`S3` add data at the record address scaled to bytes.
 * - `S7`..`S9` set the execution start address.
 * - `S5`/`S6` record counts are checked for syntax only.
 */
export function readSrec(image: ImageState, records: string, overwrite = false): void {
  for (const line of recordLines(records)) {
    const { type, address, data } = unpackSrec(line);
    switch (type) {
      case '0':
        image.header = data;
        break;
      case '1':
      case '2':
      case '3': {
        const min = address * image.wordSizeBytes;
        image.segments.add(new Segment(min, min + data.length, data, image.wordSizeBytes), overwrite);
        break;
      }
      case '7':
      case '8':
      case '9':
        image.executionStartAddress = address;
        break;
      case '5':
      case '6':
        break;
    }
  }
}
