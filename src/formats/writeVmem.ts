import { toHex, toHexByte } from '../records/hex.js';
import { printableHeader } from './header.js';
import type { ImageView } from './types.js';

const BYTES_PER_LINE = 16;

/**
 * Create Verilog VMEM text: `@ADDR` followed by the words of up to 16 bytes per line.
 *
 * The header, if any, becomes a leading block comment.
 */
export function writeVmem(image: ImageView): string {
  const lines: string[] = [];
  const wordSizeBytes = image.wordSizeBytes;
  if (image.header !== undefined) {
    lines.push(`/* ${printableHeader(image.header).replaceAll('*/', '\\x2a/')} */`);
  }

  const wordsPerLine = Math.max(1, Math.floor(BYTES_PER_LINE / wordSizeBytes));
  for (const { address, data } of image.segments.chunks(wordsPerLine)) {
    const words: string[] = [];
    for (let i = 0; i < data.length; i += wordSizeBytes) {
      words.push(Array.from(data.subarray(i, i + wordSizeBytes), toHexByte).join(''));
    }
    lines.push(`@${toHex(address, 8)} ${words.join(' ')}`);
  }

  return lines.join('\n') + '\n';
}
