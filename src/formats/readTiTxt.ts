import { TiTxtError } from '../errors.js';
import { Segment } from '../memory/segment.js';
import { hexToBytes, isHex } from '../records/hex.js';
import type { ImageState } from './types.js';

/** Data bytes on a full TI-TXT line. */
export const TI_TXT_BYTES_PER_LINE = 16;

function parseDataLine(line: string): Uint8Array {
  const hex = line.replace(/\s+/g, '');
  if (hex.length % 2 !== 0 || !isHex(hex)) throw new TiTxtError('bad data');
  return hexToBytes(hex);
}

/**
 * Add TI-TXT data to `image`.
 *
 * `@ADDR` opens a section; full lines advance the cursor, a short line closes the section. The text
 * must end with a `q` line and nothing after it.
 */
export function readTiTxt(image: ImageState, text: string, overwrite = false): void {
  let address: number | undefined;
  let eofFound = false;
  const lines = text.split(/\r?\n/);
  // A trailing newline is not a blank line.
  if (lines[lines.length - 1] === '') lines.pop();

  for (const raw of lines) {
    if (eofFound) throw new TiTxtError('bad file terminator');

    const line = raw.trim();
    if (line.length < 1) throw new TiTxtError('bad line length');

    if (line[0] === 'q') {
      eofFound = true;
    } else if (line[0] === '@') {
      const hex = line.slice(1);
      if (hex.length === 0 || !isHex(hex)) throw new TiTxtError('bad section address');
      address = parseInt(hex, 16) * image.wordSizeBytes;
    } else {
      const data = parseDataLine(line);
      if (data.length > TI_TXT_BYTES_PER_LINE) throw new TiTxtError('bad line length');
      if (address === undefined) throw new TiTxtError('missing section address');

      image.segments.add(
        new Segment(address, address + data.length, data, image.wordSizeBytes),
        overwrite,
      );
      address = data.length === TI_TXT_BYTES_PER_LINE ? address + data.length : undefined;
    }
  }

  if (!eofFound) throw new TiTxtError('missing file terminator');
}
