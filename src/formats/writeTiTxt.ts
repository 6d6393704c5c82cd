import { toHex, toHexByte } from '../records/hex.js';
import { TI_TXT_BYTES_PER_LINE } from './readTiTxt.js';
import type { ImageView } from './types.js';

/**
 * Create TI-TXT text: one `@ADDR` line per segment, 16 bytes per data line, then `q`.
 */
export function writeTiTxt(image: ImageView): string {
  const lines: string[] = [];
  const wordsPerLine = Math.max(1, Math.floor(TI_TXT_BYTES_PER_LINE / image.wordSizeBytes));

  for (const segment of image.segments.segments()) {
    lines.push(`@${toHex(segment.address, 4)}`);
    for (const { data } of segment.chunks(wordsPerLine)) {
      lines.push(Array.from(data, toHexByte).join(' '));
    }
  }

  lines.push('q');
  return lines.join('\n') + '\n';
}
