import type { ImageView, WriteArrayOptions } from './types.js';
import { writeBin } from './writeBin.js';

/**
 * Flattened image as `0x..` words joined by `separator`, ready to paste into a C array initializer.
 */
export function writeArray(image: ImageView, opts?: WriteArrayOptions): string {
  const binary = writeBin(image, opts);
  const wordSizeBytes = image.wordSizeBytes;
  const words: string[] = [];

  for (let offset = 0; offset < binary.length; offset += wordSizeBytes) {
    let word = '';
    for (const b of binary.subarray(offset, offset + wordSizeBytes)) {
      word += b.toString(16).padStart(2, '0');
    }
    words.push(`0x${word}`);
  }

  return words.join(opts?.separator ?? ', ');
}
